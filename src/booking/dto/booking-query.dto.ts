import { IsString, IsNotEmpty, IsOptional, IsUUID } from 'class-validator';

export class BookingQueryDto {
  @IsUUID()
  @IsOptional()
  classroom_id?: string;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  owner?: string;
}

export class CancelBookingQueryDto {
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  owner?: string;
}
