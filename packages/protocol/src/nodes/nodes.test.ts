// Tests for node identifier, path and dimension helpers

import { describe, it, expect } from 'vitest';
import {
  InvalidNodeAggregateIdError,
  isValidNodeAggregateId,
  parseNodeAggregateId,
} from './identifiers.js';
import { toPathPrefix } from './paths.js';
import { getCoordinate, dimensionSpacePointHash } from './dimensions.js';

describe('parseNodeAggregateId', () => {
  it('should accept lowercase alphanumerics and dashes', () => {
    expect(parseNodeAggregateId('5f2c-a1b0')).toBe('5f2c-a1b0');
    expect(isValidNodeAggregateId('sites')).toBe(true);
  });

  it('should reject paths', () => {
    expect(() => parseNodeAggregateId('/sites/acme')).toThrow(InvalidNodeAggregateIdError);
  });

  it('should reject uppercase, empty and overlong values', () => {
    expect(isValidNodeAggregateId('Acme')).toBe(false);
    expect(isValidNodeAggregateId('')).toBe(false);
    expect(isValidNodeAggregateId('a'.repeat(256))).toBe(false);
    expect(isValidNodeAggregateId('a'.repeat(255))).toBe(true);
  });

  it('should carry the rejected value on the error', () => {
    try {
      parseNodeAggregateId('Not An Id');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidNodeAggregateIdError);
      if (error instanceof InvalidNodeAggregateIdError) {
        expect(error.value).toBe('Not An Id');
      }
    }
  });
});

describe('toPathPrefix', () => {
  it('should append exactly one trailing slash', () => {
    expect(toPathPrefix('/sites/a')).toBe('/sites/a/');
    expect(toPathPrefix('/sites/a/')).toBe('/sites/a/');
    expect(toPathPrefix('/sites/a///')).toBe('/sites/a/');
  });

  it('should keep the root as a single slash', () => {
    expect(toPathPrefix('/')).toBe('/');
    expect(toPathPrefix('')).toBe('/');
  });
});

describe('dimension space points', () => {
  it('should return the coordinate of a dimension', () => {
    expect(getCoordinate({ language: 'de', market: 'eu' }, 'language')).toBe('de');
  });

  it('should return undefined for a missing dimension', () => {
    expect(getCoordinate({ language: 'de' }, 'market')).toBeUndefined();
    expect(getCoordinate({ language: 'de' }, 'toString')).toBeUndefined();
  });

  it('should hash independently of key order', () => {
    expect(dimensionSpacePointHash({ language: 'de', market: 'eu' })).toBe(
      dimensionSpacePointHash({ market: 'eu', language: 'de' })
    );
    expect(dimensionSpacePointHash({ language: 'de' })).not.toBe(
      dimensionSpacePointHash({ language: 'fr' })
    );
  });
});
