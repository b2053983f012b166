import { Entity, PrimaryGeneratedColumn, Column, OneToMany, Index } from 'typeorm';
import { Booking } from '../../booking/entities/booking.entity';

@Entity('classroom')
@Index(['name'])
export class Classroom {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 100 })
  type!: string;

  @Column({ type: 'int' })
  level!: number;

  @Column({ type: 'int' })
  size!: number;

  @Column({ type: 'text', nullable: true })
  image_url!: string | null;

  @OneToMany(() => Booking, (booking) => booking.classroom)
  bookings?: Booking[];
}
