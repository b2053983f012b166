import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BookingModule } from '../booking/booking.module';
import { ClassroomController } from './classroom.controller';
import { ClassroomService } from './services/classroom.service';
import { ClassroomSeeder } from './services/classroom.seeder';
import { ClassroomRepository } from './repositories/classroom.repository';
import { Classroom } from './entities/classroom.entity';

@Module({
  controllers: [ClassroomController],
  providers: [ClassroomService, ClassroomRepository, ClassroomSeeder],
  exports: [ClassroomService],
  imports: [TypeOrmModule.forFeature([Classroom]), BookingModule],
})
export class ClassroomModule {}
