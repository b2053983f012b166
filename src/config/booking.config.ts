import { registerAs } from '@nestjs/config';
import { BookingPolicy } from '../booking/validation/booking-validator';

export type BookingStorageMode = 'single' | 'per-unit';

export interface BookingConfig extends BookingPolicy {
  /**
   * `single` stores one record per booking; `per-unit` stores one record per
   * granularity unit of the booked window.
   */
  storageMode: BookingStorageMode;
}

export const bookingConfig = registerAs(
  'booking',
  (): BookingConfig => ({
    openHour: parseInt(process.env.BOOKING_OPEN_HOUR || '7', 10),
    closeHour: parseInt(process.env.BOOKING_CLOSE_HOUR || '18', 10),
    granularityMinutes: parseInt(process.env.BOOKING_GRANULARITY_MINUTES || '60', 10),
    storageMode: process.env.BOOKING_STORAGE_MODE === 'per-unit' ? 'per-unit' : 'single',
  }),
);
