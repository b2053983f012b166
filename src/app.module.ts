import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { databaseConfig } from './config/database.config';
import { bookingConfig } from './config/booking.config';
import { validate } from './config/env-validation';
import { BookingModule } from './booking/booking.module';
import { ClassroomModule } from './classroom/classroom.module';
import { ReviewModule } from './review/review.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, bookingConfig],
      validate,
    }),
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (config: ConfigType<typeof databaseConfig>) => config,
    }),
    BookingModule,
    ClassroomModule,
    ReviewModule,
  ],
})
export class AppModule {}
