import { HttpException, HttpStatus, NotFoundException } from '@nestjs/common';
import { RejectionReason } from '../../booking/validation/booking-validator';

export interface ConflictInfo {
  booking_id: string;
  start_time: string;
  end_time: string;
}

const REJECTION_MESSAGES: Record<RejectionReason, string> = {
  [RejectionReason.MisalignedTime]: 'Booking times must fall on the booking granularity, e.g. 10:00',
  [RejectionReason.OutsideOperatingHours]: 'Booking falls outside operating hours',
  [RejectionReason.InvalidOrder]: 'start_time must be before end_time',
  [RejectionReason.Conflict]: 'Classroom is not available for the given time slot',
};

const REJECTION_STATUS: Record<RejectionReason, HttpStatus> = {
  [RejectionReason.MisalignedTime]: HttpStatus.BAD_REQUEST,
  [RejectionReason.OutsideOperatingHours]: HttpStatus.BAD_REQUEST,
  [RejectionReason.InvalidOrder]: HttpStatus.BAD_REQUEST,
  [RejectionReason.Conflict]: HttpStatus.CONFLICT,
};

export class BookingRejectedException extends HttpException {
  constructor(
    readonly reason: RejectionReason,
    readonly conflicts: ConflictInfo[] = [],
  ) {
    const status = REJECTION_STATUS[reason];
    super(
      {
        code: reason,
        message: REJECTION_MESSAGES[reason],
        error: status === HttpStatus.CONFLICT ? 'Conflict' : 'Bad Request',
        ...(conflicts.length > 0 && { conflicts }),
      },
      status,
    );
  }
}

export class BookingNotFoundError extends NotFoundException {
  constructor(bookingId: string) {
    super({
      code: 'booking.not_found',
      error: 'Not Found',
      message: `Booking with ID ${bookingId} not found`,
    });
  }
}

export class ClassroomNotFoundError extends NotFoundException {
  constructor(classroomId: string) {
    super({
      code: 'classroom.not_found',
      error: 'Not Found',
      message: `Classroom with ID ${classroomId} not found`,
    });
  }
}
