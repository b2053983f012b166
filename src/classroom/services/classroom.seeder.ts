import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClassroomRepository, NewClassroom } from '../repositories/classroom.repository';

export const SAMPLE_CLASSROOMS: NewClassroom[] = [
  { name: 'A101', type: 'Studio', level: 1, size: 20, image_url: null },
  { name: 'B202', type: 'Lecture Hall', level: 2, size: 50, image_url: null },
  { name: 'C303', type: 'Lab', level: 3, size: 30, image_url: null },
  { name: 'D404', type: 'Seminar Room', level: 4, size: 15, image_url: null },
];

/**
 * Fills an empty classroom table with sample rooms when SEED_DATABASE=true.
 */
@Injectable()
export class ClassroomSeeder implements OnApplicationBootstrap {
  private readonly logger = new Logger(ClassroomSeeder.name);

  constructor(
    private readonly classroomRepository: ClassroomRepository,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (this.configService.get<string>('SEED_DATABASE') !== 'true') {
      return;
    }
    await this.seed();
  }

  async seed(): Promise<number> {
    if ((await this.classroomRepository.count()) > 0) {
      this.logger.debug('Classrooms already present, skipping seed');
      return 0;
    }

    const created = await this.classroomRepository.insertMany(SAMPLE_CLASSROOMS);
    this.logger.log(`Seeded ${created.length} classrooms`);
    return created.length;
  }
}
