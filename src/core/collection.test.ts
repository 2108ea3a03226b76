/**
 * Unit tests for EntityCollection
 */

import { EntityCollection } from './collection';
import { Entity, RelationMap } from './entity';
import { ResourceId } from './resource-id';
import { KeyNotFoundError, UsageError } from '../errors';

class Widget extends Entity {
  static readonly resource: string = 'widget';
}

class Gadget extends Entity {
  static readonly resource: string = 'gadget';
}

class Kind extends Entity {
  static readonly resource: string = 'kind';
  static readonly compoundIds: boolean = false;

  override equals(other: unknown): boolean {
    if (typeof other === 'string') {
      return this.id?.toLowerCase() === other.toLowerCase();
    }
    return super.equals(other);
  }
}

class Part extends Entity {
  static readonly resource: string = 'part';
  static readonly relations: RelationMap = Object.freeze({ kind: Kind });
}

function widget(id: string, fields: Record<string, unknown> = {}): Widget {
  return new Widget({ id, ...fields });
}

describe('EntityCollection', () => {
  describe('add and lookup', () => {
    it('should keep first insertion order and overwrite in place', () => {
      const collection = new EntityCollection(Widget);
      collection.add(widget('a', { version: 1 }));
      collection.add(widget('b'));
      collection.add(widget('a', { version: 2 }));
      collection.add(widget('c'));

      expect(collection.toArray().map(entity => entity.id)).toEqual(['a', 'b', 'c']);
      expect(collection.get('a').get('version')).toBe(2);
      expect(collection.size).toBe(3);
    });

    it('should look members up by bare id, key or ResourceId', () => {
      const collection = new EntityCollection(Widget, [widget('a')]);

      expect(collection.get('a').id).toBe('a');
      expect(collection.get('widget-a').id).toBe('a');
      expect(collection.get(ResourceId.of('widget-a')).id).toBe('a');
      expect(collection.has('a')).toBe(true);
      expect(collection.has('b')).toBe(false);
    });

    it('should throw KeyNotFoundError for an unknown id', () => {
      const collection = new EntityCollection(Widget);

      expect(() => collection.get('zzz')).toThrow(KeyNotFoundError);
      expect(() => collection.get('zzz')).toThrow('no entry with id "zzz"');
    });

    it('should reject entities of another type or without an id', () => {
      const collection = new EntityCollection<Entity>(Widget);

      expect(() => collection.add(new Gadget({ id: 'a' }))).toThrow(UsageError);
      expect(() => collection.add(new Widget({}))).toThrow(
        'cannot add Widget without an id to a collection'
      );
    });

    it('should remove members and fail on unknown ones', () => {
      const collection = new EntityCollection(Widget, [widget('a'), widget('b')]);

      collection.remove('a');

      expect(collection.toArray().map(entity => entity.id)).toEqual(['b']);
      expect(() => collection.remove('a')).toThrow(KeyNotFoundError);
    });
  });

  describe('filteredBy', () => {
    const collection = new EntityCollection(Widget, [
      widget('a', { color: 'red', size: 1 }),
      widget('b', { color: 'blue', size: 1 }),
      widget('c', { color: 'red', size: '1' }),
    ]);

    it('should require at least one condition', () => {
      expect(() => collection.filteredBy({})).toThrow(UsageError);
    });

    it('should match every condition strictly', () => {
      const matches = [...collection.filteredBy({ color: 'red', size: 1 })];

      expect(matches.map(entity => entity.id)).toEqual(['a']);
    });

    it('should accept snake_case condition names', () => {
      const parts = new EntityCollection(Widget, [widget('a', { serialNumber: 'S1' })]);

      expect([...parts.filteredBy({ serial_number: 'S1' })]).toHaveLength(1);
    });

    it('should compare entity-valued fields through their equals', () => {
      const parts = new EntityCollection(Part, [
        new Part({ id: 'p1', kind: { id: 'Bolt' } }),
        new Part({ id: 'p2', kind: { id: 'Nut' } }),
      ]);

      expect([...parts.filteredBy({ kind: 'bolt' })].map(part => part.id)).toEqual(['p1']);
    });
  });

  describe('createdBefore', () => {
    const collection = new EntityCollection(Widget, [
      widget('old', { createdAt: 100 }),
      widget('new', { createdAt: 200 }),
      widget('unknown'),
    ]);

    it('should keep members created strictly before the cutoff', () => {
      const ids = [...collection.createdBefore(200)].map(entity => entity.id);

      expect(ids).toEqual(['old', 'unknown']);
    });

    it('should always include members without a creation time', () => {
      expect([...collection.createdBefore(0)].map(entity => entity.id)).toEqual(['unknown']);
    });

    it('should accept a Date', () => {
      const ids = [...collection.createdBefore(new Date(150 * 1000))].map(entity => entity.id);

      expect(ids).toEqual(['old', 'unknown']);
    });
  });

  describe('set algebra', () => {
    const left = new EntityCollection(Widget, [widget('a'), widget('b')]);
    const right = new EntityCollection(Widget, [widget('b'), widget('c')]);
    left.markComplete();

    it('should compute union, intersection and difference', () => {
      expect([...left.union(right).ids()]).toEqual(['widget-a', 'widget-b', 'widget-c']);
      expect([...left.intersection(right).ids()]).toEqual(['widget-b']);
      expect([...left.difference(right).ids()]).toEqual(['widget-a']);
    });

    it('should never mark a derived collection complete', () => {
      expect(left.complete).toBe(true);
      expect(left.union(right).complete).toBe(false);
      expect(left.intersection(right).complete).toBe(false);
    });
  });

  describe('serialization', () => {
    it('should list plain records', () => {
      const collection = new EntityCollection(Widget, [widget('a', { color: 'red' })]);

      expect(collection.toList()).toEqual([{ id: 'a', color: 'red' }]);
    });

    it('should preview at most three members', () => {
      const collection = new EntityCollection(
        Widget,
        ['a', 'b', 'c', 'd'].map(id => widget(id))
      );

      expect(collection.toString()).toBe('WidgetCollection(4) [a, b, c, ...]');
    });
  });
});
