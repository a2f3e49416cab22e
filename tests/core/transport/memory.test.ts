import { describe, it, expect, vi } from 'vitest';
import { MemoryTransport } from '@/core/transport/memory';
import { TransportError } from '@/core/errors';

describe('MemoryTransport', () => {
  const endpoint = { host: '127.0.0.1', port: 47000 };

  it('should hand a sent payload to the listener', async () => {
    const transport = new MemoryTransport();
    const onMessage = vi.fn();
    await transport.bind(endpoint, onMessage, new AbortController().signal);

    await transport.send(endpoint, '[]');

    expect(onMessage).toHaveBeenCalledWith('[]');
  });

  it('should assign distinct ports when asked for port 0', async () => {
    const transport = new MemoryTransport();
    const signal = new AbortController().signal;

    const first = await transport.bind({ host: '127.0.0.1', port: 0 }, () => undefined, signal);
    const second = await transport.bind({ host: '127.0.0.1', port: 0 }, () => undefined, signal);

    expect(first.endpoint).toEqual({ host: '127.0.0.1', port: 49152 });
    expect(second.endpoint).toEqual({ host: '127.0.0.1', port: 49153 });
  });

  it('should refuse an address that is already bound', async () => {
    const transport = new MemoryTransport();
    await transport.bind(endpoint, () => undefined, new AbortController().signal);

    await expect(
      transport.bind(endpoint, () => undefined, new AbortController().signal)
    ).rejects.toThrow('Address 127.0.0.1:47000 already in use');
  });

  it('should refuse to bind with an aborted signal', async () => {
    const transport = new MemoryTransport();
    const controller = new AbortController();
    controller.abort();

    await expect(transport.bind(endpoint, () => undefined, controller.signal)).rejects.toThrow(
      TransportError
    );
    expect(transport.isListening(endpoint)).toBe(false);
  });

  it('should reject sends to an endpoint nobody listens on', async () => {
    const transport = new MemoryTransport();

    await expect(transport.send(endpoint, '[]')).rejects.toThrow(
      'Connection refused by 127.0.0.1:47000'
    );
  });

  it('should stop listening once the signal aborts', async () => {
    const transport = new MemoryTransport();
    const controller = new AbortController();
    const listener = await transport.bind(endpoint, () => undefined, controller.signal);

    controller.abort();
    await listener.closed;

    expect(transport.isListening(endpoint)).toBe(false);
    await expect(transport.send(endpoint, '[]')).rejects.toThrow(TransportError);
  });

  it('should keep listening after the handler rejects a payload', async () => {
    const transport = new MemoryTransport();
    const onMessage = vi
      .fn()
      .mockImplementationOnce(() => {
        throw new Error('bad payload');
      })
      .mockImplementation(() => undefined);
    await transport.bind(endpoint, onMessage, new AbortController().signal);

    await expect(transport.send(endpoint, 'garbage')).resolves.toBeUndefined();
    await transport.send(endpoint, '[]');

    expect(onMessage).toHaveBeenCalledTimes(2);
    expect(transport.isListening(endpoint)).toBe(true);
  });
});
