import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ClassroomModule } from '../classroom/classroom.module';
import { ReviewController } from './review.controller';
import { ReviewService } from './services/review.service';
import { ReviewRepository } from './repositories/review.repository';
import { Review } from './entities/review.entity';

@Module({
  controllers: [ReviewController],
  providers: [ReviewService, ReviewRepository],
  imports: [TypeOrmModule.forFeature([Review]), ClassroomModule],
})
export class ReviewModule {}
