/**
 * 결과 출력 인터페이스
 */

import type { OverallRating } from "@/core/domain/OverallRating";
import type { ReviewRecord } from "@/core/domain/ReviewRecord";

export interface IReviewWriter {
  /** 출력 위치 준비 (디렉토리 생성) */
  prepare(): Promise<void>;

  /** 전체 평점 한 행 기록 */
  writeMetadata(rating: OverallRating): Promise<void>;

  /** 리뷰 행 추가 기록 */
  writeReviews(records: readonly ReviewRecord[]): Promise<void>;
}
