import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Classroom } from '../../classroom/entities/classroom.entity';

@Entity('booking')
@Index(['classroom_id'])
@Index(['classroom_id', 'start_time', 'end_time'])
@Index(['owner'])
export class Booking {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  classroom_id!: string;

  @ManyToOne(() => Classroom, (classroom) => classroom.bookings, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'classroom_id' })
  classroom?: Classroom;

  @Column({ type: 'varchar', length: 255 })
  owner!: string;

  @Column({ type: 'timestamptz' })
  start_time!: Date;

  @Column({ type: 'timestamptz' })
  end_time!: Date;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
