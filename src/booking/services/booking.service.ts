import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { bookingConfig } from '../../config/booking.config';
import {
  BookingNotFoundError,
  BookingRejectedException,
  ClassroomNotFoundError,
} from '../../common/exceptions/booking.exceptions';
import { Booking } from '../entities/booking.entity';
import { CreateBookingDto } from '../dto/create-booking.dto';
import { UpdateBookingDto } from '../dto/update-booking.dto';
import { BookingQueryDto } from '../dto/booking-query.dto';
import {
  BookingCancelledResponse,
  BookingCreatedResponse,
  BookingUpdatedResponse,
  BookingView,
  TimeSlotView,
  toBookingView,
} from '../dto/booking-response.dto';
import { BookingRepository } from '../repositories/booking.repository';
import {
  TimeWindow,
  admitBooking,
  expandToUnitSlots,
  isAvailable,
} from '../validation/booking-validator';

function formatWindow(window: TimeWindow): string {
  const format = (instant: Date) =>
    isNaN(instant.getTime()) ? 'invalid date' : instant.toISOString();
  return `${format(window.start)} - ${format(window.end)}`;
}

@Injectable()
export class BookingService {
  private readonly logger = new Logger(BookingService.name);

  constructor(
    private readonly bookingRepository: BookingRepository,
    @Inject(bookingConfig.KEY)
    private readonly config: ConfigType<typeof bookingConfig>,
  ) {}

  /**
   * Create a booking. In `per-unit` storage mode the window is stored as one
   * record per granularity unit.
   */
  async createBooking(dto: CreateBookingDto): Promise<BookingCreatedResponse> {
    const window = this.toWindow(dto.start_time, dto.end_time);

    const created = await this.bookingRepository.runExclusive(
      dto.classroom_id,
      async (tx) => {
        if (!tx.classroom) {
          throw new ClassroomNotFoundError(dto.classroom_id);
        }

        const existing = await tx.findByClassroom(dto.classroom_id);
        this.assertAdmitted(dto.classroom_id, window, existing);

        const windows =
          this.config.storageMode === 'per-unit'
            ? [...expandToUnitSlots(window, this.config.granularityMinutes)]
            : [window];

        return await tx.insert(
          windows.map((slot) => ({
            classroom_id: dto.classroom_id,
            owner: dto.owner,
            start_time: slot.start,
            end_time: slot.end,
          })),
        );
      },
    );

    this.logger.log(
      `Booked classroom ${dto.classroom_id} for ${dto.owner} (${formatWindow(window)}, ${created.length} record(s))`,
    );

    return {
      message: 'Booking created successfully',
      bookings: created.map(toBookingView),
    };
  }

  /**
   * Replace a booking's classroom, owner and window. The booking is checked
   * against every other booking of the target classroom but not itself.
   */
  async updateBooking(
    bookingId: string,
    dto: UpdateBookingDto,
  ): Promise<BookingUpdatedResponse> {
    const window = this.toWindow(dto.start_time, dto.end_time);

    const updated = await this.bookingRepository.runExclusive(
      dto.classroom_id,
      async (tx) => {
        const booking = await tx.findById(bookingId);
        if (!booking) {
          throw new BookingNotFoundError(bookingId);
        }
        if (!tx.classroom) {
          throw new ClassroomNotFoundError(dto.classroom_id);
        }

        const existing = await tx.findByClassroom(dto.classroom_id);
        this.assertAdmitted(dto.classroom_id, window, existing, bookingId);

        booking.classroom_id = dto.classroom_id;
        booking.owner = dto.owner;
        booking.start_time = window.start;
        booking.end_time = window.end;
        return await tx.save(booking);
      },
    );

    this.logger.log(`Updated booking ${bookingId}`);

    return {
      message: 'Booking updated successfully',
      booking: toBookingView(updated),
    };
  }

  /**
   * Cancel a booking. When `owner` is given, a booking held by someone else is
   * reported as not found.
   */
  async cancelBooking(
    bookingId: string,
    owner?: string,
  ): Promise<BookingCancelledResponse> {
    const current = await this.bookingRepository.findById(bookingId);
    if (!current) {
      throw new BookingNotFoundError(bookingId);
    }

    const cancelled = await this.bookingRepository.runExclusive(
      current.classroom_id,
      async (tx) => {
        const booking = await tx.findById(bookingId);
        if (!booking || (owner !== undefined && booking.owner !== owner)) {
          throw new BookingNotFoundError(bookingId);
        }
        await tx.remove(booking);
        return booking;
      },
    );

    this.logger.log(`Cancelled booking ${bookingId}`);

    return {
      message: 'Booking cancelled successfully',
      booking: toBookingView(cancelled),
    };
  }

  async getBooking(bookingId: string): Promise<BookingView> {
    const booking = await this.bookingRepository.findById(bookingId);
    if (!booking) {
      throw new BookingNotFoundError(bookingId);
    }
    return toBookingView(booking);
  }

  async listBookings(query: BookingQueryDto): Promise<BookingView[]> {
    const bookings = await this.bookingRepository.findAll(query);
    return bookings.map(toBookingView);
  }

  /**
   * Granularity-sized slots covering the operating hours of `date`
   * (YYYY-MM-DD, UTC), each marked with whether it is free.
   */
  async getDaySlots(classroomId: string, date: string): Promise<TimeSlotView[]> {
    const day = new Date(`${date}T00:00:00.000Z`);
    // Date rolls 2025-02-30 over into March
    if (isNaN(day.getTime()) || day.toISOString().slice(0, 10) !== date) {
      throw new BadRequestException(`Invalid date: ${date}`);
    }

    const hourMs = 60 * 60 * 1000;
    const opening: TimeWindow = {
      start: new Date(day.getTime() + this.config.openHour * hourMs),
      end: new Date(day.getTime() + this.config.closeHour * hourMs),
    };

    const bookings = await this.bookingRepository.findInRange(
      classroomId,
      opening.start,
      opening.end,
    );

    return Array.from(
      expandToUnitSlots(opening, this.config.granularityMinutes),
      (slot) => ({
        start_time: slot.start.toISOString(),
        end_time: slot.end.toISOString(),
        available: isAvailable(classroomId, slot, bookings),
      }),
    );
  }

  private toWindow(startTime: string, endTime: string): TimeWindow {
    return { start: new Date(startTime), end: new Date(endTime) };
  }

  private assertAdmitted(
    classroomId: string,
    window: TimeWindow,
    existing: Booking[],
    excludeId?: string,
  ): void {
    const admission = admitBooking(
      classroomId,
      window,
      existing,
      this.config,
      excludeId,
    );

    if (!admission.accepted) {
      this.logger.warn(
        `Rejected booking of classroom ${classroomId} (${formatWindow(window)}): ${admission.reason}`,
      );
      throw new BookingRejectedException(
        admission.reason,
        admission.conflicts.map((c) => ({
          booking_id: c.id,
          start_time: c.start_time.toISOString(),
          end_time: c.end_time.toISOString(),
        })),
      );
    }
  }
}
