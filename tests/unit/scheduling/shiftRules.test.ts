import { assertOwnersExchangeable, assertPartnerAllowed, groupByWeek, resolveSlot } from '../../../src/lib/scheduling/shiftRules';
import { InvalidPartnerError, InvalidSlotDateError } from '../../../src/lib/scheduling/errors';
import { makeShift } from '../../helpers/fixtures';

describe('shiftRules', () => {
  describe('resolveSlot', () => {
    it('returns the slot when the date falls on its weekday', () => {
      const slot = resolveSlot('collaborator', 'DOMINGO_MANHA', '2026-06-14');

      expect(slot.startTime).toBe('08:00');
      expect(slot.endTime).toBe('13:00');
      expect(slot.weekday).toBe('DOM');
    });

    it('rejects a Saturday slot on a Sunday', () => {
      expect(() => resolveSlot('collaborator', 'SABADO_TARDE1', '2026-06-14')).toThrow(
        'Date 2026-06-14 is not a valid Saturday for SABADO_TARDE1'
      );
    });

    it('rejects a slot from the other rotation', () => {
      expect(() => resolveSlot('collaborator', 'SABADO_DUPLA', '2026-06-13')).toThrow(InvalidSlotDateError);
    });
  });

  describe('assertPartnerAllowed', () => {
    const paired = resolveSlot('technician', 'SABADO_DUPLA', '2026-06-13');
    const solo = resolveSlot('technician', 'DOMINGO_AVULSO', '2026-06-14');

    it('accepts a second person on a paired slot', () => {
      expect(() => assertPartnerAllowed(paired, 'p1', 'p2')).not.toThrow();
    });

    it('accepts no partner anywhere', () => {
      expect(() => assertPartnerAllowed(solo, 'p1', null)).not.toThrow();
    });

    it('rejects a partner on a solo slot', () => {
      expect(() => assertPartnerAllowed(solo, 'p1', 'p2')).toThrow(
        'Slot DOMINGO_AVULSO does not take a second person'
      );
    });

    it('rejects pairing someone with themselves', () => {
      expect(() => assertPartnerAllowed(paired, 'p1', 'p1')).toThrow(InvalidPartnerError);
    });
  });

  describe('assertOwnersExchangeable', () => {
    const dupla = makeShift({
      domain: 'technician',
      slotType: 'SABADO_DUPLA',
      personId: 'p1',
      partnerId: 'p2',
      partnerName: 'Bruno Lima',
    });

    it('accepts owners who are not on each other’s shift', () => {
      const other = makeShift({ domain: 'technician', slotType: 'DOMINGO_AVULSO', personId: 'p3' });

      expect(() => assertOwnersExchangeable(dupla, other)).not.toThrow();
      expect(() => assertOwnersExchangeable(other, dupla)).not.toThrow();
    });

    it('rejects handing a paired shift to its partner, in either order', () => {
      const partnersShift = makeShift({ domain: 'technician', slotType: 'DOMINGO_AVULSO', personId: 'p2' });

      expect(() => assertOwnersExchangeable(dupla, partnersShift)).toThrow(
        new InvalidPartnerError('A swap cannot make someone the partner on their own shift')
      );
      expect(() => assertOwnersExchangeable(partnersShift, dupla)).toThrow(InvalidPartnerError);
    });
  });

  describe('groupByWeek', () => {
    it('groups by Monday-start week and sorts by date and start time', () => {
      const sunday = makeShift({ shiftId: 's3', date: '2026-06-14', slotType: 'DOMINGO_MANHA', startTime: '08:00' });
      const saturdayEvening = makeShift({ shiftId: 's2', date: '2026-06-13', slotType: 'SABADO_TARDE2', startTime: '17:00' });
      const saturdayAfternoon = makeShift({ shiftId: 's1', date: '2026-06-13', startTime: '13:00' });
      const nextWeek = makeShift({ shiftId: 's4', date: '2026-06-20' });

      const weeks = groupByWeek([nextWeek, sunday, saturdayEvening, saturdayAfternoon]);

      expect(weeks.map((w) => [w.weekStart, w.weekEnd, w.shifts.map((s) => s.shiftId)])).toEqual([
        ['2026-06-08', '2026-06-14', ['s1', 's2', 's3']],
        ['2026-06-15', '2026-06-21', ['s4']],
      ]);
    });

    it('returns no weeks for no shifts', () => {
      expect(groupByWeek([])).toEqual([]);
    });
  });
});
