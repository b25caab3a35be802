/**
 * 리뷰 요소 파서 인터페이스
 * Strategy Pattern (전체 화면 / 다이얼로그)
 */

import type { ReviewRecord } from "@/core/domain/ReviewRecord";
import type { IElementScope } from "./IElementScope";

export interface IReviewParser {
  /**
   * 리뷰 요소 하나를 레코드로 변환
   * @returns 작성자/평점을 찾지 못하면 null
   */
  parse(scope: IElementScope): Promise<ReviewRecord | null>;
}
