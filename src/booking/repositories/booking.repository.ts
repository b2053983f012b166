import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, DataSource, EntityManager, FindOptionsWhere } from 'typeorm';
import { Booking } from '../entities/booking.entity';
import { Classroom } from '../../classroom/entities/classroom.entity';

export interface NewBooking {
  classroom_id: string;
  owner: string;
  start_time: Date;
  end_time: Date;
}

export interface BookingFilter {
  classroom_id?: string;
  owner?: string;
}

/**
 * Data access available while a classroom is locked by `runExclusive`.
 */
export interface BookingTransaction {
  /** The locked classroom, or null when it does not exist. */
  classroom: Classroom | null;
  /** Reads a booking and locks its row until the transaction ends. */
  findById(id: string): Promise<Booking | null>;
  findByClassroom(classroomId: string): Promise<Booking[]>;
  insert(bookings: NewBooking[]): Promise<Booking[]>;
  save(booking: Booking): Promise<Booking>;
  remove(booking: Booking): Promise<void>;
}

@Injectable()
export class BookingRepository {
  constructor(
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Runs `work` in a transaction holding a row lock on the classroom, so that
   * reading the classroom's bookings and writing new ones cannot interleave
   * with another admission for the same classroom.
   */
  async runExclusive<T>(
    classroomId: string,
    work: (tx: BookingTransaction) => Promise<T>,
  ): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const manager = queryRunner.manager;
      const classroom = await manager.findOne(Classroom, {
        where: { id: classroomId },
        lock: { mode: 'pessimistic_write' },
      });

      const result = await work(this.createTransaction(manager, classroom));

      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  private createTransaction(
    manager: EntityManager,
    classroom: Classroom | null,
  ): BookingTransaction {
    return {
      classroom,
      findById: (id) =>
        manager.findOne(Booking, {
          where: { id },
          lock: { mode: 'pessimistic_write' },
        }),
      findByClassroom: (classroomId) =>
        manager.find(Booking, {
          where: { classroom_id: classroomId },
          order: { start_time: 'ASC' },
        }),
      insert: (bookings) =>
        manager.save(
          Booking,
          bookings.map((booking) => manager.create(Booking, booking)),
        ),
      save: (booking) => manager.save(Booking, booking),
      remove: async (booking) => {
        await manager.delete(Booking, { id: booking.id });
      },
    };
  }

  async findById(id: string): Promise<Booking | null> {
    return await this.bookingRepository.findOne({ where: { id } });
  }

  async findAll(filter: BookingFilter): Promise<Booking[]> {
    const where: FindOptionsWhere<Booking> = {};
    if (filter.classroom_id) {
      where.classroom_id = filter.classroom_id;
    }
    if (filter.owner) {
      where.owner = filter.owner;
    }

    return await this.bookingRepository.find({
      where,
      order: { start_time: 'ASC' },
    });
  }

  /**
   * Bookings of a classroom that overlap `[startTime, endTime)`.
   */
  async findInRange(
    classroomId: string,
    startTime: Date,
    endTime: Date,
  ): Promise<Booking[]> {
    return await this.bookingRepository
      .createQueryBuilder('booking')
      .where('booking.classroom_id = :classroomId', { classroomId })
      .andWhere('booking.start_time < :endTime', { endTime })
      .andWhere('booking.end_time > :startTime', { startTime })
      .orderBy('booking.start_time', 'ASC')
      .getMany();
  }
}
