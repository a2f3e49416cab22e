/**
 * Wire format for distance-vector advertisements
 *
 * A payload is a UTF-8 JSON array of `[source, destination, cost]` triples,
 * one advertisement per connection. JSON cannot carry Infinity, so an
 * unreachable destination travels as `null`.
 */

import { z } from 'zod';
import { MalformedAdvertisementError } from './errors.js';
import type { RoutingTableEntry } from './routing/types.js';

export const ACKNOWLEDGEMENT = 'Data received';

const WireCostSchema = z.number().nonnegative().nullable();

export const WireEntrySchema = z.tuple([z.string().min(1), z.string().min(1), WireCostSchema]);

export const AdvertisementSchema = z.array(WireEntrySchema);

export type WireEntry = z.infer<typeof WireEntrySchema>;

export function encodeAdvertisement(entries: readonly RoutingTableEntry[]): string {
  const wire: WireEntry[] = entries.map(({ source, destination, cost }) => [
    source,
    destination,
    Number.isFinite(cost) ? cost : null,
  ]);
  return JSON.stringify(wire);
}

/**
 * Parse and validate a payload
 * @throws MalformedAdvertisementError if the payload is not valid JSON or not a list of triples
 */
export function decodeAdvertisement(payload: string): RoutingTableEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    throw new MalformedAdvertisementError('Payload is not valid JSON', { cause: error });
  }

  const result = AdvertisementSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue';
    throw new MalformedAdvertisementError(`Payload is not a list of routing triples (${where})`);
  }

  return result.data.map(([source, destination, cost]) => ({
    source,
    destination,
    cost: cost ?? Infinity,
  }));
}
