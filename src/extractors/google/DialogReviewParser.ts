/**
 * 다이얼로그 리뷰 파서 ("N Google reviews" 팝업)
 *
 * Google 게시 리뷰 구조:
 * - div[1]: 작성자, 평점, 리뷰 섹션 (숙박 유형 / 본문 / 원문)
 * - div[2]: 사진 캐러셀 (있을 때만)
 * - div[3] 또는 div[4]: 사장님 답글 (사진 유무에 따라 위치 변경)
 *
 * 타 사이트 리뷰는 앵커(a) 레이아웃, reviewSite = "other"
 */

import { ReviewRecord, createReviewRecord } from "@/core/domain/ReviewRecord";
import type { DialogConfig } from "@/core/domain/SiteConfig";
import type { IElementScope } from "@/core/interfaces/IElementScope";
import type { IReviewParser } from "@/core/interfaces/IReviewParser";
import { HumanizedDate } from "@/extractors/common/HumanizedDate";
import { ImageUrl } from "@/extractors/common/ImageUrl";
import { SelectorChain } from "@/extractors/common/SelectorChain";
import { TextNormalizer } from "@/extractors/common/TextNormalizer";
import { ReviewTextParser } from "./ReviewTextParser";

const OWNER_RESPONSE_MARKER = "Response from the owner";
const OTHER_SITE = "other";

interface ReviewSections {
  stayType: string | null;
  review: string | null;
  ratingTags: string | null;
}

interface OwnerResponse {
  text: string | null;
  time: string | null;
}

export class DialogReviewParser implements IReviewParser {
  private readonly username: SelectorChain;
  private readonly userProfile: SelectorChain;
  private readonly rating: SelectorChain;
  private readonly date: SelectorChain;
  private readonly otherSiteText: SelectorChain;
  private readonly images: SelectorChain;

  constructor(
    private readonly config: DialogConfig,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.username = new SelectorChain(config.fields.username);
    this.userProfile = new SelectorChain(config.fields.user_profile);
    this.rating = new SelectorChain(config.fields.rating);
    this.date = new SelectorChain(config.fields.date);
    this.otherSiteText = new SelectorChain(config.fields.other_site_text);
    this.images = new SelectorChain(config.fields.images);
  }

  async parse(scope: IElementScope): Promise<ReviewRecord | null> {
    const username = await this.username.resolve(scope);
    const score = ReviewTextParser.parseScore(await this.rating.resolve(scope));
    if (!username || !score) {
      return null;
    }

    const now = this.clock();
    const parsedDate = ReviewTextParser.splitReviewDate(await this.date.resolve(scope));
    const base = {
      username,
      date: parsedDate.date,
      reviewPostDate: HumanizedDate.toTimestamp(parsedDate.date, now),
      ratingScore: score.ratingScore,
      totalRatingScore: score.totalRatingScore,
    };

    const isGoogleLayout = (await scope.count(this.config.google_marker)) > 0;
    if (!isGoogleLayout) {
      const text = await this.otherSiteText.resolve(scope);
      return createReviewRecord({
        ...base,
        enLangText: text,
        otherLangText: text,
        reviewSite: OTHER_SITE,
      });
    }

    const sections = await this.readSections(scope, this.config.review_sections);
    const original = await this.readSections(scope, this.config.original_sections);
    const hasPhotos = (await scope.count(this.config.photo_carousel)) > 0;
    const ownerResponse = await this.readOwnerResponse(
      scope,
      hasPhotos
        ? this.config.owner_response.with_photos
        : this.config.owner_response.without_photos,
    );

    return createReviewRecord({
      ...base,
      userProfile: await this.userProfile.resolve(scope),
      reviewSite: parsedDate.reviewSite,
      stayType: sections.stayType,
      enLangText: sections.review,
      ratingTags: sections.ratingTags,
      otherLangText: original.review,
      ownerResponseText: ownerResponse.text,
      ownerResponseTime: ownerResponse.time,
      reviewImages: hasPhotos ? await this.readImages(scope) : [],
    });
  }

  /**
   * 리뷰 섹션 (숙박 유형 / 본문)
   * - 하위 div 3개 이상: div[1] 숙박 유형, div[2] 본문
   * - 2개: div[1]이 본문이거나 (본문 없으면) 숙박 유형
   */
  private async readSections(scope: IElementScope, base: string): Promise<ReviewSections> {
    const sections: ReviewSections = { stayType: null, review: null, ratingTags: null };
    const sectionCount = await scope.count(`${base}/div`);

    let staySelector: string | null = null;
    let reviewSelector: string | null = null;
    if (sectionCount > 2) {
      staySelector = `${base}/div[1]`;
      reviewSelector = await this.firstPresent(scope, [
        `${base}/div[2]/span/span/span`,
        `${base}/div[2]/span/span`,
      ]);
    } else if (sectionCount > 1) {
      reviewSelector = await this.firstPresent(scope, [
        `${base}/div[1]/span/span/span`,
        `${base}/div[1]/span/span`,
      ]);
      if (reviewSelector === null) {
        staySelector = `${base}/div[1]`;
      }
    }

    if (staySelector) {
      sections.stayType = TextNormalizer.clean(await scope.text(staySelector));
    }
    if (reviewSelector) {
      const raw = await scope.text(reviewSelector);
      if (raw) {
        const split = ReviewTextParser.splitDialogText(raw);
        sections.review = split.review;
        sections.ratingTags = split.ratingTags;
      }
    }
    return sections;
  }

  /**
   * 사장님 답글 (시각 + 본문, "More" 펼침 본문 우선)
   */
  private async readOwnerResponse(
    scope: IElementScope,
    base: string,
  ): Promise<OwnerResponse> {
    if ((await scope.count(base)) === 0) {
      return { text: null, time: null };
    }

    const header = TextNormalizer.clean(await scope.text(`${base}/div[1]`));
    const time = header
      ? TextNormalizer.clean(header.split(OWNER_RESPONSE_MARKER).pop())
      : null;

    const expanded = `${base}/div[2]/span[2]`;
    const textSelector = (await scope.count(expanded)) > 0 ? expanded : `${base}/div[2]`;
    return { text: TextNormalizer.clean(await scope.text(textSelector)), time };
  }

  private async readImages(scope: IElementScope): Promise<string[]> {
    const styles = await this.images.resolveAll(scope);
    return styles
      .map((style) => ImageUrl.fromBackgroundStyle(style))
      .filter((url): url is string => url !== null)
      .map((url) => ImageUrl.resize(url));
  }

  private async firstPresent(
    scope: IElementScope,
    selectors: readonly string[],
  ): Promise<string | null> {
    for (const selector of selectors) {
      if ((await scope.count(selector)) > 0) {
        return selector;
      }
    }
    return null;
  }
}
