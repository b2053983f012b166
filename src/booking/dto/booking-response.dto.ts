import { Booking } from '../entities/booking.entity';

export interface BookingView {
  booking_id: string;
  classroom_id: string;
  owner: string;
  start_time: string;
  end_time: string;
}

export interface BookingCreatedResponse {
  message: string;
  bookings: BookingView[];
}

export interface BookingUpdatedResponse {
  message: string;
  booking: BookingView;
}

export interface BookingCancelledResponse {
  message: string;
  booking: BookingView;
}

export interface TimeSlotView {
  start_time: string;
  end_time: string;
  available: boolean;
}

export function toBookingView(booking: Booking): BookingView {
  return {
    booking_id: booking.id,
    classroom_id: booking.classroom_id,
    owner: booking.owner,
    start_time: booking.start_time.toISOString(),
    end_time: booking.end_time.toISOString(),
  };
}
