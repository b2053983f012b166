import { Injectable, Logger } from '@nestjs/common';
import { ClassroomService } from '../../classroom/services/classroom.service';
import { ReviewRepository } from '../repositories/review.repository';
import { CreateReviewDto } from '../dto/create-review.dto';
import { ReviewCreatedResponse, ReviewView, toReviewView } from '../dto/review-response.dto';

@Injectable()
export class ReviewService {
  private readonly logger = new Logger(ReviewService.name);

  constructor(
    private readonly reviewRepository: ReviewRepository,
    private readonly classroomService: ClassroomService,
  ) {}

  async addReview(dto: CreateReviewDto): Promise<ReviewCreatedResponse> {
    await this.classroomService.getExisting(dto.classroom_id);

    const review = await this.reviewRepository.create(dto);
    this.logger.log(`Review ${review.id} added for classroom ${dto.classroom_id}`);

    return {
      message: 'Your review has been submitted!',
      review: toReviewView(review),
    };
  }

  async listReviews(classroomId?: string): Promise<ReviewView[]> {
    const reviews = await this.reviewRepository.findAll(classroomId);
    return reviews.map(toReviewView);
  }
}
