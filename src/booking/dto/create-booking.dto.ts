import {
  IsString,
  IsNotEmpty,
  IsDateString,
  IsUUID,
  Matches,
  MaxLength,
} from 'class-validator';

// Instants are read in UTC; without an offset `new Date` would use the host zone.
const EXPLICIT_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/;
const OFFSET_MESSAGE = '$property must include a time zone offset, e.g. 2025-01-06T09:00:00Z';

export class CreateBookingDto {
  @IsUUID()
  classroom_id!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  owner!: string; // Student name or user reference

  @Matches(EXPLICIT_OFFSET, { message: OFFSET_MESSAGE })
  @IsDateString({ strict: true })
  @IsNotEmpty()
  start_time!: string;

  @Matches(EXPLICIT_OFFSET, { message: OFFSET_MESSAGE })
  @IsDateString({ strict: true })
  @IsNotEmpty()
  end_time!: string;
}
