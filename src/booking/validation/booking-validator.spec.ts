import {
  BookedWindow,
  BookingPolicy,
  RejectionReason,
  TimeWindow,
  admitBooking,
  expandToUnitSlots,
  findConflicts,
  isAvailable,
  isOverlapping,
  validateWindow,
} from './booking-validator';

const policy: BookingPolicy = { openHour: 7, closeHour: 18, granularityMinutes: 60 };

const at = (time: string, day = '2025-01-06'): Date =>
  new Date(`${day}T${time}:00.000Z`);

const win = (start: string, end: string): TimeWindow => ({
  start: at(start),
  end: at(end),
});

const booking = (
  id: string,
  start: string,
  end: string,
  classroomId = 'room-1',
): BookedWindow => ({
  id,
  classroom_id: classroomId,
  start_time: at(start),
  end_time: at(end),
});

describe('BookingValidator', () => {
  describe('validateWindow', () => {
    it('should accept an aligned window inside operating hours', () => {
      expect(validateWindow(win('09:00', '10:00'), policy)).toBeNull();
    });

    it('should accept windows touching the opening and closing hour', () => {
      expect(validateWindow(win('07:00', '08:00'), policy)).toBeNull();
      expect(validateWindow(win('17:00', '18:00'), policy)).toBeNull();
      expect(validateWindow(win('07:00', '18:00'), policy)).toBeNull();
    });

    it('should reject a start that is not on the hour', () => {
      expect(validateWindow(win('09:30', '10:30'), policy)).toBe(
        RejectionReason.MisalignedTime,
      );
    });

    it('should reject an end that is not on the hour', () => {
      expect(validateWindow(win('09:00', '10:30'), policy)).toBe(
        RejectionReason.MisalignedTime,
      );
    });

    it('should reject instants carrying seconds', () => {
      const window = {
        start: new Date('2025-01-06T09:00:30.000Z'),
        end: at('10:00'),
      };
      expect(validateWindow(window, policy)).toBe(RejectionReason.MisalignedTime);
    });

    it('should report misalignment before operating hours', () => {
      expect(validateWindow(win('05:30', '06:00'), policy)).toBe(
        RejectionReason.MisalignedTime,
      );
    });

    it('should treat an unparseable instant as misaligned', () => {
      const window = { start: new Date('not a date'), end: at('10:00') };
      expect(validateWindow(window, policy)).toBe(RejectionReason.MisalignedTime);
    });

    it('should reject a window ending after closing', () => {
      expect(validateWindow(win('18:00', '19:00'), policy)).toBe(
        RejectionReason.OutsideOperatingHours,
      );
    });

    it('should reject a window starting before opening', () => {
      expect(validateWindow(win('06:00', '08:00'), policy)).toBe(
        RejectionReason.OutsideOperatingHours,
      );
    });

    it('should reject a window running past midnight', () => {
      const window = { start: at('17:00'), end: at('08:00', '2025-01-07') };
      expect(validateWindow(window, policy)).toBe(
        RejectionReason.OutsideOperatingHours,
      );
    });

    it('should reject an end before the start', () => {
      expect(validateWindow(win('10:00', '09:00'), policy)).toBe(
        RejectionReason.InvalidOrder,
      );
    });

    it('should reject an end on an earlier day as out of order', () => {
      const window = { start: at('10:00', '2025-01-07'), end: at('09:00') };
      expect(validateWindow(window, policy)).toBe(RejectionReason.InvalidOrder);
    });

    it('should reject a zero-length window', () => {
      expect(validateWindow(win('09:00', '09:00'), policy)).toBe(
        RejectionReason.InvalidOrder,
      );
    });

    it('should reject a zero-length window at closing as out of order', () => {
      expect(validateWindow(win('18:00', '18:00'), policy)).toBe(
        RejectionReason.InvalidOrder,
      );
    });

    describe('with half-hour granularity', () => {
      const halfHour: BookingPolicy = { ...policy, granularityMinutes: 30 };

      it('should accept half-hour boundaries', () => {
        expect(validateWindow(win('09:30', '10:30'), halfHour)).toBeNull();
        expect(validateWindow(win('17:30', '18:00'), halfHour)).toBeNull();
      });

      it('should reject quarter-hour boundaries', () => {
        expect(validateWindow(win('09:15', '10:00'), halfHour)).toBe(
          RejectionReason.MisalignedTime,
        );
      });

      it('should reject an end past the closing hour mark', () => {
        expect(validateWindow(win('17:30', '18:30'), halfHour)).toBe(
          RejectionReason.OutsideOperatingHours,
        );
      });
    });
  });

  describe('isOverlapping', () => {
    it('should treat windows as half-open', () => {
      expect(isOverlapping(win('09:00', '10:00'), win('10:00', '11:00'))).toBe(false);
      expect(isOverlapping(win('10:00', '11:00'), win('09:00', '10:00'))).toBe(false);
      expect(isOverlapping(win('09:00', '11:00'), win('10:00', '12:00'))).toBe(true);
    });

    it('should agree with the interval intersection rule for every hour pair', () => {
      const hours = [7, 8, 9, 10, 11, 12];
      const hh = (h: number) => `${String(h).padStart(2, '0')}:00`;

      for (const s1 of hours) {
        for (const e1 of hours.filter((h) => h > s1)) {
          for (const s2 of hours) {
            for (const e2 of hours.filter((h) => h > s2)) {
              const expected = s1 < e2 && e1 > s2;
              expect(isOverlapping(win(hh(s1), hh(e1)), win(hh(s2), hh(e2)))).toBe(
                expected,
              );
            }
          }
        }
      }
    });
  });

  describe('isAvailable', () => {
    const existing = [booking('b1', '09:00', '10:00')];

    it('should allow a booking starting when another ends', () => {
      expect(isAvailable('room-1', win('10:00', '11:00'), existing)).toBe(true);
    });

    it('should allow a booking ending when another starts', () => {
      expect(isAvailable('room-1', win('08:00', '09:00'), existing)).toBe(true);
    });

    it('should detect an identical window', () => {
      expect(isAvailable('room-1', win('09:00', '10:00'), existing)).toBe(false);
    });

    it('should detect partial overlap', () => {
      expect(isAvailable('room-1', win('08:00', '10:00'), existing)).toBe(false);
    });

    it('should detect a window enclosing an existing booking', () => {
      expect(isAvailable('room-1', win('08:00', '11:00'), existing)).toBe(false);
    });

    it('should detect a window inside an existing booking', () => {
      const window = { start: at('09:15'), end: at('09:45') };
      expect(isAvailable('room-1', window, existing)).toBe(false);
    });

    it('should ignore bookings of other classrooms', () => {
      expect(isAvailable('room-2', win('09:00', '10:00'), existing)).toBe(true);
    });

    it('should never report a conflict with the excluded booking', () => {
      expect(isAvailable('room-1', win('09:00', '10:00'), existing, 'b1')).toBe(true);
      expect(isAvailable('room-1', win('08:00', '11:00'), existing, 'b1')).toBe(true);
    });

    it('should still check the remaining bookings when one is excluded', () => {
      const bookings = [booking('b1', '09:00', '10:00'), booking('b2', '10:00', '11:00')];
      expect(isAvailable('room-1', win('09:00', '11:00'), bookings, 'b1')).toBe(false);
    });

    it('should accept any iterable of bookings', () => {
      function* stream() {
        yield booking('b1', '09:00', '10:00');
      }
      expect(isAvailable('room-1', win('09:00', '10:00'), stream())).toBe(false);
    });

    it('should be available when there are no bookings', () => {
      expect(isAvailable('room-1', win('09:00', '10:00'), [])).toBe(true);
    });
  });

  describe('findConflicts', () => {
    it('should return every overlapping booking of the classroom in input order', () => {
      const bookings = [
        booking('b1', '09:00', '10:00'),
        booking('b2', '10:00', '11:00'),
        booking('b3', '11:00', '12:00'),
        booking('b4', '09:00', '10:00', 'room-2'),
      ];

      const conflicts = findConflicts('room-1', win('09:00', '11:00'), bookings);

      expect(conflicts.map((c) => c.id)).toEqual(['b1', 'b2']);
    });

    it('should skip the excluded booking', () => {
      const bookings = [booking('b1', '09:00', '10:00')];
      expect(findConflicts('room-1', win('09:00', '10:00'), bookings, 'b1')).toEqual([]);
    });
  });

  describe('expandToUnitSlots', () => {
    it('should split a window into contiguous hours', () => {
      const slots = [...expandToUnitSlots(win('09:00', '12:00'))];

      expect(slots).toEqual([
        win('09:00', '10:00'),
        win('10:00', '11:00'),
        win('11:00', '12:00'),
      ]);
    });

    it('should reconstruct the original window without gaps', () => {
      const window = win('07:00', '18:00');
      const slots = [...expandToUnitSlots(window)];

      expect(slots).toHaveLength(11);
      expect(slots[0].start).toEqual(window.start);
      expect(slots[slots.length - 1].end).toEqual(window.end);
      for (let i = 1; i < slots.length; i++) {
        expect(slots[i].start).toEqual(slots[i - 1].end);
      }
    });

    it('should produce a single slot for a one-unit window', () => {
      expect([...expandToUnitSlots(win('09:00', '10:00'))]).toEqual([
        win('09:00', '10:00'),
      ]);
    });

    it('should honour a custom unit', () => {
      const slots = [...expandToUnitSlots(win('09:00', '10:00'), 30)];

      expect(slots).toEqual([win('09:00', '09:30'), win('09:30', '10:00')]);
    });

    it('should be restartable', () => {
      const slots = expandToUnitSlots(win('09:00', '11:00'));

      expect([...slots]).toEqual([...slots]);
      expect([...slots]).toHaveLength(2);
    });

    it('should refuse a window that is not a whole number of units', () => {
      expect(() => expandToUnitSlots(win('09:00', '10:30'))).toThrow(RangeError);
    });

    it('should refuse empty and reversed windows', () => {
      expect(() => expandToUnitSlots(win('09:00', '09:00'))).toThrow(RangeError);
      expect(() => expandToUnitSlots(win('10:00', '09:00'))).toThrow(RangeError);
    });
  });

  describe('admitBooking', () => {
    it('should accept a free slot on an empty classroom', () => {
      expect(admitBooking('room-1', win('09:00', '10:00'), [], policy)).toEqual({
        accepted: true,
      });
    });

    it('should reject the same window submitted twice', () => {
      const existing = [booking('b1', '09:00', '10:00')];

      expect(admitBooking('room-1', win('09:00', '10:00'), existing, policy)).toEqual({
        accepted: false,
        reason: RejectionReason.Conflict,
        conflicts: existing,
      });
    });

    it('should reject a window after closing', () => {
      expect(admitBooking('room-1', win('18:00', '19:00'), [], policy)).toEqual({
        accepted: false,
        reason: RejectionReason.OutsideOperatingHours,
        conflicts: [],
      });
    });

    it('should reject a misaligned window', () => {
      expect(admitBooking('room-1', win('09:30', '10:30'), [], policy)).toEqual({
        accepted: false,
        reason: RejectionReason.MisalignedTime,
        conflicts: [],
      });
    });

    it('should reject a reversed window', () => {
      expect(admitBooking('room-1', win('10:00', '09:00'), [], policy)).toEqual({
        accepted: false,
        reason: RejectionReason.InvalidOrder,
        conflicts: [],
      });
    });

    describe('next to an existing 09:00-10:00 booking', () => {
      const existing = [booking('b1', '09:00', '10:00')];

      it('should accept a booking starting at 10:00', () => {
        expect(admitBooking('room-1', win('10:00', '11:00'), existing, policy).accepted).toBe(
          true,
        );
      });

      it('should report misalignment before the overlap', () => {
        const admission = admitBooking('room-1', win('08:00', '09:30'), existing, policy);

        expect(admission).toEqual({
          accepted: false,
          reason: RejectionReason.MisalignedTime,
          conflicts: [],
        });
      });

      it('should reject an aligned overlapping booking as a conflict', () => {
        const admission = admitBooking('room-1', win('08:00', '10:00'), existing, policy);

        expect(admission).toEqual({
          accepted: false,
          reason: RejectionReason.Conflict,
          conflicts: existing,
        });
      });

      it('should let a booking be moved over its own slot', () => {
        const admission = admitBooking('room-1', win('09:00', '11:00'), existing, policy, 'b1');

        expect(admission).toEqual({ accepted: true });
      });
    });
  });
});
