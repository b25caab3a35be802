/**
 * OverallRating - 장소 전체 평점 요약 (metadata.csv 한 행)
 */

export const STAR_LEVELS = [5, 4, 3, 2, 1] as const;

export type StarLevel = (typeof STAR_LEVELS)[number];

export interface OverallRating {
  entityName: string;
  rating: number | null;
  reviewCount: number | null;
  /** 별점별 비율 (%) - 전체 화면 모드에서만 제공 */
  starDistribution?: Partial<Record<StarLevel, string | null>>;
}
