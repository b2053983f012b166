import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Classroom } from '../entities/classroom.entity';

export type NewClassroom = Omit<Classroom, 'id' | 'bookings'>;

@Injectable()
export class ClassroomRepository {
  constructor(
    @InjectRepository(Classroom)
    private readonly classroomRepository: Repository<Classroom>,
  ) {}

  async findPage(offset: number, limit: number): Promise<Classroom[]> {
    return await this.classroomRepository.find({
      order: { name: 'ASC' },
      skip: offset,
      take: limit,
    });
  }

  async findById(id: string): Promise<Classroom | null> {
    return await this.classroomRepository.findOne({ where: { id } });
  }

  async count(): Promise<number> {
    return await this.classroomRepository.count();
  }

  async insertMany(classrooms: NewClassroom[]): Promise<Classroom[]> {
    return await this.classroomRepository.save(
      classrooms.map((classroom) => this.classroomRepository.create(classroom)),
    );
  }
}
