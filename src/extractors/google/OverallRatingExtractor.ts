/**
 * 전체 평점 추출기
 *
 * 표시 방식(전체 화면 / 다이얼로그)에 따라 요약 영역 라벨을 읽어 OverallRating 생성
 * 라벨이 없으면 해당 값은 null (리뷰 수집은 계속 진행)
 */

import {
  OverallRating,
  STAR_LEVELS,
  StarLevel,
} from "@/core/domain/OverallRating";
import type { ReviewViewMode, SiteConfig } from "@/core/domain/SiteConfig";
import type { IElementScope } from "@/core/interfaces/IElementScope";
import { TextNormalizer } from "@/extractors/common/TextNormalizer";
import { OverallRatingParser } from "./OverallRatingParser";

const ARIA_LABEL = "aria-label";

export class OverallRatingExtractor {
  constructor(private readonly config: SiteConfig) {}

  async extract(
    page: IElementScope,
    mode: ReviewViewMode,
    entityName: string,
  ): Promise<OverallRating> {
    return mode === "full_screen"
      ? this.extractFullScreen(page, entityName)
      : this.extractDialog(page, entityName);
  }

  private async extractFullScreen(
    page: IElementScope,
    entityName: string,
  ): Promise<OverallRating> {
    const summary = this.config.full_screen.summary;
    const label = await page.attribute(summary.rating_label, ARIA_LABEL);

    const starDistribution: Partial<Record<StarLevel, string | null>> = {};
    for (const star of STAR_LEVELS) {
      const starLabel = await page.attribute(
        summary.star_label.replace("{star}", String(star)),
        ARIA_LABEL,
      );
      starDistribution[star] = OverallRatingParser.parseStarShare(starLabel);
    }

    return {
      entityName,
      rating: OverallRatingParser.parseRating(label),
      reviewCount: OverallRatingParser.parseReviewCount(label),
      starDistribution,
    };
  }

  private async extractDialog(
    page: IElementScope,
    entityName: string,
  ): Promise<OverallRating> {
    const summary = this.config.dialog.summary;
    const label = await page.attribute(summary.rating_label, ARIA_LABEL);
    const countText = TextNormalizer.clean(await page.text(summary.review_count_text));

    return {
      entityName,
      rating: OverallRatingParser.parseRating(label),
      reviewCount: OverallRatingParser.parseReviewCount(countText),
    };
  }
}
