/**
 * 리뷰 컨테이너 인터페이스
 *
 * 스크롤하면서 리뷰 요소가 늘어나는 목록 (가상화로 재렌더링 가능)
 *
 * SOLID 원칙:
 * - DIP: 추출 루프는 브라우저가 아닌 이 인터페이스에 의존
 * - ISP: 루프에 필요한 4개 동작만 정의
 */

import type { ReviewRecord } from "@/core/domain/ReviewRecord";

export interface IReviewContainer {
  /** 현재 렌더링된 리뷰 요소 수 (실패 시 throw) */
  countRendered(): Promise<number>;

  /**
   * index번째 요소 파싱
   * @returns 필수 필드를 찾지 못하면 null
   */
  parseAt(index: number): Promise<ReviewRecord | null>;

  /** 추가 로딩을 위한 스크롤 (실패 시 throw) */
  scrollForMore(): Promise<void>;

  /** 스크롤 가능 높이 (진행 여부 판단용, 실패 시 throw) */
  scrollExtent(): Promise<number>;
}
