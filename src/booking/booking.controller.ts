import {
  Controller,
  Post,
  Put,
  Body,
  HttpCode,
  HttpStatus,
  Query,
  Get,
  Delete,
  Param,
  ParseUUIDPipe,
} from '@nestjs/common';
import { BookingService } from './services/booking.service';
import { CreateBookingDto } from './dto/create-booking.dto';
import { UpdateBookingDto } from './dto/update-booking.dto';
import { BookingQueryDto, CancelBookingQueryDto } from './dto/booking-query.dto';

@Controller('bookings')
export class BookingController {
  constructor(private readonly bookingService: BookingService) {}

  @Get()
  listBookings(@Query() query: BookingQueryDto) {
    return this.bookingService.listBookings(query);
  }

  @Get(':id')
  getBooking(@Param('id', ParseUUIDPipe) id: string) {
    return this.bookingService.getBooking(id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  createBooking(@Body() createBookingDto: CreateBookingDto) {
    return this.bookingService.createBooking(createBookingDto);
  }

  @Put(':id')
  @HttpCode(HttpStatus.OK)
  updateBooking(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateBookingDto: UpdateBookingDto,
  ) {
    return this.bookingService.updateBooking(id, updateBookingDto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.OK)
  cancelBooking(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: CancelBookingQueryDto,
  ) {
    return this.bookingService.cancelBooking(id, query.owner);
  }
}
