import type { WirePresence } from '../../models/WireTypes';
import { decodeKeyed, encodeKeyed } from '../KeyedCollection';
import { presenceFromWire, presenceToWire } from '../PresenceCodec';

function wirePresence(id: string, status: WirePresence['status']): WirePresence {
  return {
    activities: [],
    status,
    user: { id }
  };
}

describe('KeyedCollection', () => {
  describe('decodeKeyed', () => {
    it('should key each element by its own identifier', () => {
      const map = decodeKeyed(
        [wirePresence('7', 'online'), wirePresence('3', 'idle')],
        item => presenceFromWire(item),
        presence => presence.user.id
      );

      expect([...map.keys()]).toEqual(['7', '3']);
      expect(map.get('3')?.status).toBe('idle');
    });

    it('should keep the last occurrence of a duplicate identifier', () => {
      const map = decodeKeyed(
        [wirePresence('7', 'online'), wirePresence('3', 'idle'), wirePresence('7', 'dnd')],
        item => presenceFromWire(item),
        presence => presence.user.id,
        'presences'
      );

      expect(map.size).toBe(2);
      expect(map.get('7')?.status).toBe('dnd');
      expect(map.get('3')?.status).toBe('idle');
    });

    it('should decode an absent field to an empty map', () => {
      expect(decodeKeyed<WirePresence, string>(undefined, () => 'x', value => value).size).toBe(0);
      expect(decodeKeyed<WirePresence, string>(null, () => 'x', value => value).size).toBe(0);
    });

    it('should pass the element index to the item decoder', () => {
      const map = decodeKeyed(['a', 'b'], (item, index) => `${item}${index}`, value => value);

      expect([...map.keys()]).toEqual(['a0', 'b1']);
    });
  });

  describe('encodeKeyed', () => {
    it('should emit every value once', () => {
      const map = decodeKeyed(
        [wirePresence('1', 'online'), wirePresence('2', 'offline')],
        item => presenceFromWire(item),
        presence => presence.user.id
      );

      const wire = encodeKeyed(map, presenceToWire);

      expect(wire).toHaveLength(2);
      expect(wire.map(presence => presence.user.id).sort()).toEqual(['1', '2']);
    });

    it('should encode an empty map to an empty array', () => {
      expect(encodeKeyed(new Map<string, number>(), value => value)).toEqual([]);
    });
  });
});
