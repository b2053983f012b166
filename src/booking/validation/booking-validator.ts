export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface BookingPolicy {
  openHour: number;
  closeHour: number;
  granularityMinutes: number;
}

/**
 * The slice of a stored booking the validator looks at.
 */
export interface BookedWindow {
  id: string;
  classroom_id: string;
  start_time: Date;
  end_time: Date;
}

export enum RejectionReason {
  MisalignedTime = 'MISALIGNED_TIME',
  OutsideOperatingHours = 'OUTSIDE_OPERATING_HOURS',
  InvalidOrder = 'INVALID_ORDER',
  Conflict = 'CONFLICT',
}

export type Admission<T extends BookedWindow = BookedWindow> =
  | { accepted: true }
  | { accepted: false; reason: RejectionReason; conflicts: T[] };

const MINUTE_MS = 60 * 1000;

function isAligned(instant: Date, granularityMinutes: number): boolean {
  const minuteOfDay = instant.getUTCHours() * 60 + instant.getUTCMinutes();
  return (
    minuteOfDay % granularityMinutes === 0 &&
    instant.getUTCSeconds() === 0 &&
    instant.getUTCMilliseconds() === 0
  );
}

function utcDayNumber(instant: Date): number {
  return Math.floor(instant.getTime() / (24 * 60 * MINUTE_MS));
}

function isWithinOperatingHours(window: TimeWindow, policy: BookingPolicy): boolean {
  const { start, end } = window;

  // A window that runs past midnight covers closed hours.
  if (utcDayNumber(end) > utcDayNumber(start)) {
    return false;
  }

  const endHour = end.getUTCHours();
  return (
    start.getUTCHours() >= policy.openHour &&
    (endHour < policy.closeHour ||
      (endHour === policy.closeHour && end.getUTCMinutes() === 0))
  );
}

/**
 * Checks a window against the booking policy. Returns null when the window is
 * acceptable, otherwise the first rule it breaks: alignment, then operating
 * hours, then ordering.
 */
export function validateWindow(
  window: TimeWindow,
  policy: BookingPolicy,
): RejectionReason | null {
  if (
    !isAligned(window.start, policy.granularityMinutes) ||
    !isAligned(window.end, policy.granularityMinutes)
  ) {
    return RejectionReason.MisalignedTime;
  }

  if (!isWithinOperatingHours(window, policy)) {
    return RejectionReason.OutsideOperatingHours;
  }

  if (window.start.getTime() >= window.end.getTime()) {
    return RejectionReason.InvalidOrder;
  }

  return null;
}

/**
 * Half-open interval intersection: touching endpoints never overlap.
 */
export function isOverlapping(a: TimeWindow, b: TimeWindow): boolean {
  return a.start < b.end && a.end > b.start;
}

function conflictsWith(
  booking: BookedWindow,
  classroomId: string,
  window: TimeWindow,
  excludeId?: string,
): boolean {
  return (
    booking.classroom_id === classroomId &&
    booking.id !== excludeId &&
    isOverlapping(window, { start: booking.start_time, end: booking.end_time })
  );
}

export function isAvailable(
  classroomId: string,
  window: TimeWindow,
  existingBookings: Iterable<BookedWindow>,
  excludeId?: string,
): boolean {
  for (const booking of existingBookings) {
    if (conflictsWith(booking, classroomId, window, excludeId)) {
      return false;
    }
  }
  return true;
}

export function findConflicts<T extends BookedWindow>(
  classroomId: string,
  window: TimeWindow,
  existingBookings: Iterable<T>,
  excludeId?: string,
): T[] {
  const conflicts: T[] = [];
  for (const booking of existingBookings) {
    if (conflictsWith(booking, classroomId, window, excludeId)) {
      conflicts.push(booking);
    }
  }
  return conflicts;
}

/**
 * Splits a window into contiguous unit-sized windows. The returned iterable can
 * be walked any number of times.
 *
 * @throws RangeError when the window is not a positive whole number of units.
 */
export function expandToUnitSlots(
  window: TimeWindow,
  unitMinutes: number = 60,
): Iterable<TimeWindow> {
  const unitMs = unitMinutes * MINUTE_MS;
  const startMs = window.start.getTime();
  const duration = window.end.getTime() - startMs;

  if (!(unitMs > 0) || !(duration > 0) || duration % unitMs !== 0) {
    throw new RangeError(
      `Window of ${duration / MINUTE_MS} minutes is not a whole number of ${unitMinutes}-minute units`,
    );
  }

  const count = duration / unitMs;

  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < count; i++) {
        yield {
          start: new Date(startMs + i * unitMs),
          end: new Date(startMs + (i + 1) * unitMs),
        };
      }
    },
  };
}

/**
 * Decides whether a booking may be stored. Malformed windows are rejected
 * before the conflict scan runs.
 */
export function admitBooking<T extends BookedWindow>(
  classroomId: string,
  window: TimeWindow,
  existingBookings: readonly T[],
  policy: BookingPolicy,
  excludeId?: string,
): Admission<T> {
  const invalid = validateWindow(window, policy);
  if (invalid) {
    return { accepted: false, reason: invalid, conflicts: [] };
  }

  if (!isAvailable(classroomId, window, existingBookings, excludeId)) {
    return {
      accepted: false,
      reason: RejectionReason.Conflict,
      conflicts: findConflicts(classroomId, window, existingBookings, excludeId),
    };
  }

  return { accepted: true };
}
