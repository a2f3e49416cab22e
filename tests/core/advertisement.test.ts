import { describe, it, expect } from 'vitest';
import { decodeAdvertisement, encodeAdvertisement } from '@/core/advertisement';
import { MalformedAdvertisementError } from '@/core/errors';

describe('advertisement codec', () => {
  describe('encodeAdvertisement', () => {
    it('should encode rows as a JSON array of triples', () => {
      const payload = encodeAdvertisement([
        { source: '1', destination: '1', cost: 0 },
        { source: '1', destination: '2', cost: 3.5 },
      ]);

      expect(payload).toBe('[["1","1",0],["1","2",3.5]]');
    });

    it('should encode an unreachable destination as null', () => {
      const payload = encodeAdvertisement([{ source: '1', destination: '3', cost: Infinity }]);

      expect(payload).toBe('[["1","3",null]]');
    });

    it('should encode an empty table as an empty list', () => {
      expect(encodeAdvertisement([])).toBe('[]');
    });
  });

  describe('decodeAdvertisement', () => {
    it('should decode triples and restore Infinity', () => {
      expect(decodeAdvertisement('[["2","1",3],["2","4",null]]')).toEqual([
        { source: '2', destination: '1', cost: 3 },
        { source: '2', destination: '4', cost: Infinity },
      ]);
    });

    it('should reject invalid JSON', () => {
      expect(() => decodeAdvertisement('[["2","1",3]')).toThrow(MalformedAdvertisementError);
    });

    it('should reject payloads that are not a list of triples', () => {
      expect(() => decodeAdvertisement('{"2":3}')).toThrow(MalformedAdvertisementError);
      expect(() => decodeAdvertisement('[["2","1"]]')).toThrow(MalformedAdvertisementError);
      expect(() => decodeAdvertisement('[["2","1",3,4]]')).toThrow(MalformedAdvertisementError);
      expect(() => decodeAdvertisement('[[2,"1",3]]')).toThrow(MalformedAdvertisementError);
    });

    it('should reject negative costs and empty ids', () => {
      expect(() => decodeAdvertisement('[["2","1",-1]]')).toThrow(MalformedAdvertisementError);
      expect(() => decodeAdvertisement('[["","1",1]]')).toThrow(MalformedAdvertisementError);
    });

    it('should name the offending position', () => {
      expect(() => decodeAdvertisement('[["2","1",3],["2","x","far"]]')).toThrow('1.2');
    });
  });
});
