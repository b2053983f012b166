import { Review } from '../entities/review.entity';

export interface ReviewView {
  review_id: string;
  classroom_id: string;
  author: string;
  rating: number;
  comment: string;
  created_at: string;
}

export interface ReviewCreatedResponse {
  message: string;
  review: ReviewView;
}

export function toReviewView(review: Review): ReviewView {
  return {
    review_id: review.id,
    classroom_id: review.classroom_id,
    author: review.author,
    rating: review.rating,
    comment: review.comment,
    created_at: review.created_at.toISOString(),
  };
}
