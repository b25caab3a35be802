/**
 * 모듈 API
 *
 * 사용 예:
 *   const { reviews, overallRating } = await scrapeReviews({
 *     placeName: "Harbor View Hotel",
 *     sortBy: "most_recent",
 *     maxReviews: 100,
 *   });
 */

import { ConfigLoader } from "@/config/ConfigLoader";
import { SiteConfigLoader } from "@/config/SiteConfigLoader";
import type { ScrapeInputParams } from "@/core/domain/ScrapeInput";
import { GoogleReviewScraper, ScrapeRunResult } from "@/scrapers/GoogleReviewScraper";
import { resolveScrapeInput } from "@/utils/ConfigMerger";

export interface ScrapeReviewsOptions {
  /** config.yml 경로 (기본: cwd/config.yml) */
  configPath?: string;
}

/**
 * 리뷰 수집 실행
 * 설정/입력 오류는 브라우저 실행 전에 ScrapeError로 실패
 */
export async function scrapeReviews(
  params: ScrapeInputParams,
  options: ScrapeReviewsOptions = {},
): Promise<ScrapeRunResult> {
  const config = ConfigLoader.getInstance().loadConfig(options.configPath);
  const siteConfig = SiteConfigLoader.getInstance().loadSite();
  const input = resolveScrapeInput(params, config);

  return new GoogleReviewScraper({ config, siteConfig }).run(input);
}

export type { ScrapeRunResult } from "@/scrapers/GoogleReviewScraper";
export type { ReviewRecord } from "@/core/domain/ReviewRecord";
export type { OverallRating } from "@/core/domain/OverallRating";
export type { ScrapeInputParams, SortBy } from "@/core/domain/ScrapeInput";
export { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
