import { CreateBookingDto } from './create-booking.dto';

// Updates replace every field of the booking; only the id is kept.
export class UpdateBookingDto extends CreateBookingDto {}
