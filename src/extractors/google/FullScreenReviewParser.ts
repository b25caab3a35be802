/**
 * 전체 화면 리뷰 파서 ("View all reviews" 페이지)
 *
 * - Google 게시 리뷰: 프로필 링크 + /5 평점
 * - 타 사이트 리뷰 (Agoda, Priceline 등): /10 평점
 *
 * 필드별 SelectorChain (sites/google.yaml full_screen.fields)
 */

import { ReviewRecord, createReviewRecord } from "@/core/domain/ReviewRecord";
import type { FullScreenFields } from "@/core/domain/SiteConfig";
import type { IElementScope } from "@/core/interfaces/IElementScope";
import type { IReviewParser } from "@/core/interfaces/IReviewParser";
import { HumanizedDate } from "@/extractors/common/HumanizedDate";
import { ImageUrl } from "@/extractors/common/ImageUrl";
import { SelectorChain } from "@/extractors/common/SelectorChain";
import { ReviewTextParser } from "./ReviewTextParser";

export class FullScreenReviewParser implements IReviewParser {
  private readonly username: SelectorChain;
  private readonly userProfile: SelectorChain;
  private readonly rating: SelectorChain;
  private readonly date: SelectorChain;
  private readonly stayType: SelectorChain;
  private readonly reviewText: SelectorChain;
  private readonly images: SelectorChain;

  constructor(
    fields: FullScreenFields,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.username = new SelectorChain(fields.username);
    this.userProfile = new SelectorChain(fields.user_profile);
    this.rating = new SelectorChain(fields.rating);
    this.date = new SelectorChain(fields.date);
    this.stayType = new SelectorChain(fields.stay_type);
    this.reviewText = new SelectorChain(fields.review_text);
    this.images = new SelectorChain(fields.images);
  }

  async parse(scope: IElementScope): Promise<ReviewRecord | null> {
    const username = await this.username.resolve(scope);
    const score = ReviewTextParser.parseScore(await this.rating.resolve(scope));
    if (!username || !score) {
      return null;
    }

    const now = this.clock();
    const { date, reviewSite } = ReviewTextParser.splitReviewDate(
      await this.date.resolve(scope),
    );
    const text = ReviewTextParser.parseFullScreen(
      await this.reviewText.resolveAll(scope),
      now,
    );
    const images = await this.images.resolveAll(scope);

    return createReviewRecord({
      ...text,
      username,
      userProfile: await this.userProfile.resolve(scope),
      date,
      reviewPostDate: HumanizedDate.toTimestamp(date, now),
      reviewSite,
      ratingScore: score.ratingScore,
      totalRatingScore: score.totalRatingScore,
      stayType: await this.stayType.resolve(scope),
      reviewImages: images.map((url) => ImageUrl.resize(url.trim())),
    });
  }
}
