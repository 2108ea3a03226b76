/**
 * Unit tests for ResourceId
 */

import { ResourceId } from './resource-id';
import { AmbiguousIdentifierError } from '../errors';

describe('ResourceId', () => {
  describe('parse', () => {
    it('should split an absolute key on the first comma', () => {
      const id = ResourceId.parse('patient-abc,device-123');

      expect(id.principal).toBe('patient-abc');
      expect(id.relative).toBe('device-123');
      expect(id.toString()).toBe('patient-abc,device-123');
    });

    it('should keep further commas in the relative component', () => {
      const id = ResourceId.parse('a,b,c');

      expect(id.principal).toBe('a');
      expect(id.relative).toBe('b,c');
    });

    it('should qualify a bare id with the hint', () => {
      const id = ResourceId.parse('123', 'patient');

      expect(id.toString()).toBe('patient-123');
      expect(id.relative).toBeUndefined();
    });

    it('should not prefix an id that is already qualified', () => {
      expect(ResourceId.parse('org-9', 'patient').toString()).toBe('org-9');
    });

    it('should throw AmbiguousIdentifierError without separator or hint', () => {
      expect(() => ResourceId.parse('123')).toThrow(AmbiguousIdentifierError);
      expect(() => ResourceId.parse('123')).toThrow('ambiguous resource identifier: "123"');
    });

    it('should return a ResourceId unchanged', () => {
      const id = ResourceId.of('patient-a');
      expect(ResourceId.parse(id)).toBe(id);
    });

    it('should round-trip absolute keys', () => {
      for (const raw of ['patient-a,patient', 'patient-a,device-b', 'org-x,org']) {
        expect(ResourceId.parse(ResourceId.parse(raw).toString()).toString()).toBe(raw);
      }
    });
  });

  describe('unqualified', () => {
    it('should strip the prefix of a prefixed relative component', () => {
      expect(ResourceId.parse('patient-abc,device-123').unqualified).toBe('123');
    });

    it('should fall back to the principal when the relative has no prefix', () => {
      expect(ResourceId.parse('patient-abc,patient').unqualified).toBe('abc');
    });

    it('should strip only up to the first dash', () => {
      expect(ResourceId.parse('device-a-b', 'device').unqualified).toBe('a-b');
    });

    it('should return a principal without dash whole', () => {
      expect(ResourceId.of('abc').unqualified).toBe('abc');
    });
  });

  describe('equals and contains', () => {
    const id = ResourceId.parse('patient-abc,device-123');

    it('should compare structurally and by serialization', () => {
      expect(id.equals(ResourceId.of('patient-abc', 'device-123'))).toBe(true);
      expect(id.equals('patient-abc,device-123')).toBe(true);
      expect(id.equals('123')).toBe(false);
      expect(id.equals(42)).toBe(false);
    });

    it('should probe the separator characters and the components', () => {
      expect(id.contains(',')).toBe(true);
      expect(ResourceId.of('patient-abc').contains(',')).toBe(false);
      expect(ResourceId.of('abc').contains('-')).toBe(true);
      expect(id.contains('abc')).toBe(true);
      expect(id.contains('123')).toBe(true);
      expect(id.contains('xyz')).toBe(false);
    });

    it('should expose its components as a tuple', () => {
      expect(id.asTuple()).toEqual(['patient-abc', 'device-123']);
      expect(ResourceId.of('patient-abc').asTuple()).toEqual(['patient-abc']);
    });
  });
});
