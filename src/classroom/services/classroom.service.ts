import { Injectable } from '@nestjs/common';
import { ClassroomNotFoundError } from '../../common/exceptions/booking.exceptions';
import { BookingService } from '../../booking/services/booking.service';
import { Classroom } from '../entities/classroom.entity';
import { ClassroomRepository } from '../repositories/classroom.repository';
import { ClassroomDetailView, ClassroomView } from '../dto/classroom-response.dto';

const DEFAULT_PAGE_SIZE = 100;

function toClassroomView(classroom: Classroom): ClassroomView {
  return {
    id: classroom.id,
    name: classroom.name,
    type: classroom.type,
    level: classroom.level,
    size: classroom.size,
    image_url: classroom.image_url,
  };
}

@Injectable()
export class ClassroomService {
  constructor(
    private readonly classroomRepository: ClassroomRepository,
    private readonly bookingService: BookingService,
  ) {}

  async listClassrooms(
    offset: number = 0,
    limit: number = DEFAULT_PAGE_SIZE,
  ): Promise<ClassroomView[]> {
    const classrooms = await this.classroomRepository.findPage(offset, limit);
    return classrooms.map(toClassroomView);
  }

  /**
   * A classroom together with its timeslots for `date` (YYYY-MM-DD). Defaults
   * to the current UTC day.
   */
  async getClassroom(id: string, date?: string): Promise<ClassroomDetailView> {
    const classroom = await this.getExisting(id);
    const day = date ?? new Date().toISOString().slice(0, 10);

    return {
      ...toClassroomView(classroom),
      date: day,
      timeslots: await this.bookingService.getDaySlots(classroom.id, day),
    };
  }

  async getExisting(id: string): Promise<Classroom> {
    const classroom = await this.classroomRepository.findById(id);
    if (!classroom) {
      throw new ClassroomNotFoundError(id);
    }
    return classroom;
  }
}
