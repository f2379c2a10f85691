import { describe, it, expect } from 'vitest';
import { generateCollectionId, isUuid, utcNow, fileTimestamp } from '../../utils/id.js';

describe('generateCollectionId', () => {
  it('generates a UUID', () => {
    expect(isUuid(generateCollectionId())).toBe(true);
  });

  it('generates unique IDs', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateCollectionId()));
    expect(ids.size).toBe(100);
  });
});

describe('isUuid', () => {
  it('rejects other strings', () => {
    expect(isUuid('collection-1')).toBe(false);
    expect(isUuid('')).toBe(false);
  });
});

describe('utcNow', () => {
  it('returns an ISO-8601 UTC timestamp', () => {
    expect(utcNow()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});

describe('fileTimestamp', () => {
  it('formats as YYYYMMDD_HHMMSS in UTC', () => {
    expect(fileTimestamp(new Date('2025-03-07T04:05:06.789Z'))).toBe('20250307_040506');
  });
});
