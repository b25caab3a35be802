/**
 * Google 리뷰 스크래퍼
 *
 * 흐름:
 * 1. 브라우저 실행 (playwright-extra + stealth)
 * 2. 검색어 / URL로 리뷰 화면 열기
 * 3. 전체 평점 추출 → metadata.csv
 * 4. 출처 필터, 정렬 선택
 * 5. ReviewCollector로 리뷰 수집 → reviews_{sortBy}.csv (실패 시 부분 결과 저장)
 * 6. 브라우저 정리 (finally)
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, Page } from "playwright";

import { getBrowserArgs } from "@/config/BrowserArgs";
import type { Logger } from "@/config/logger";
import type { AppConfig } from "@/core/domain/AppConfig";
import type { StopReason } from "@/core/domain/ExtractionResult";
import type { OverallRating } from "@/core/domain/OverallRating";
import type { ReviewRecord } from "@/core/domain/ReviewRecord";
import type { ScrapeInput } from "@/core/domain/ScrapeInput";
import type { ReviewViewMode, SiteConfig } from "@/core/domain/SiteConfig";
import type { IReviewContainer } from "@/core/interfaces/IReviewContainer";
import type { IReviewWriter } from "@/core/interfaces/IReviewWriter";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { ReviewCollector } from "@/extraction/ReviewCollector";
import { DialogReviewParser } from "@/extractors/google/DialogReviewParser";
import { FullScreenReviewParser } from "@/extractors/google/FullScreenReviewParser";
import { OverallRatingExtractor } from "@/extractors/google/OverallRatingExtractor";
import { HtmlDumpService } from "@/utils/HtmlDumpService";
import { createRunLogger } from "@/utils/LoggerContext";
import { getRunStamp } from "@/utils/timestamp";
import { CsvReviewWriter } from "@/writers/CsvReviewWriter";
import { PlaywrightElementScope } from "./PlaywrightElementScope";
import { PlaywrightReviewContainer } from "./PlaywrightReviewContainer";
import { ReviewPageNavigator } from "./ReviewPageNavigator";

// Stealth 플러그인 적용 (모듈 레벨)
chromium.use(StealthPlugin());

export interface ScrapeRunResult {
  reviews: ReviewRecord[];
  overallRating: OverallRating;
  reason: StopReason;
}

export interface GoogleReviewScraperOptions {
  config: AppConfig;
  siteConfig: SiteConfig;
  /** 출력 Writer 교체용 (기본: CsvReviewWriter) */
  writerFactory?: (input: ScrapeInput, startedAt: Date) => IReviewWriter;
  htmlDump?: HtmlDumpService;
}

export class GoogleReviewScraper {
  private readonly config: AppConfig;
  private readonly siteConfig: SiteConfig;
  private readonly writerFactory: (input: ScrapeInput, startedAt: Date) => IReviewWriter;
  private readonly htmlDump: HtmlDumpService;

  constructor(options: GoogleReviewScraperOptions) {
    this.config = options.config;
    this.siteConfig = options.siteConfig;
    this.writerFactory =
      options.writerFactory ??
      ((input, startedAt) =>
        new CsvReviewWriter({
          outputDir: options.config.output_dir,
          entityName: input.placeName,
          sortBy: input.sortBy,
          startedAt,
        }));
    this.htmlDump = options.htmlDump ?? new HtmlDumpService();
  }

  async run(input: ScrapeInput): Promise<ScrapeRunResult> {
    const startedAt = new Date();
    const log = createRunLogger(`${input.placeName}_${getRunStamp(startedAt)}`, input.sortBy);
    const writer = this.writerFactory(input, startedAt);
    const navigator = new ReviewPageNavigator(this.siteConfig, log);

    log.info(
      {
        placeName: input.placeName,
        pageUrl: input.pageUrl,
        maxReviews: input.maxReviews,
        stopCriteria: input.stopCriteria,
      },
      "리뷰 수집 시작",
    );

    let browser: Browser | null = null;
    try {
      browser = await this.launchBrowser();
      const page = await this.openPage(browser);

      const mode = input.pageUrl
        ? await navigator.openFromUrl(page, input.pageUrl)
        : await navigator.openFromSearch(page, input.placeName);

      await navigator.waitForSummary(page, mode);
      const overallRating = await new OverallRatingExtractor(this.siteConfig).extract(
        new PlaywrightElementScope(page.locator("html")),
        mode,
        input.placeName,
      );
      log.info({ overallRating }, "전체 평점 추출 완료");

      if (input.saveMetadata) {
        await writer.prepare();
        await writer.writeMetadata(overallRating);
      }

      if (mode === "full_screen") {
        await navigator.selectGoogleSource(page);
      }
      await navigator.selectSort(page, mode, input.sortBy);

      const collector = new ReviewCollector(
        writer,
        this.config.scroll.idle_iteration_limit,
        log,
      );
      const extraction = await collector.collect(this.createContainer(page, mode), input);

      log.info(
        {
          reason: extraction.reason,
          reviews: extraction.records.length,
          duplicates: extraction.duplicates,
          skipped: extraction.skipped,
        },
        "리뷰 수집 완료",
      );

      return {
        reviews: extraction.records,
        overallRating,
        reason: extraction.reason,
      };
    } catch (error) {
      const scrapeError = ScrapeError.wrap(error);
      log.error(scrapeError.toLogObject(), "리뷰 수집 실패");
      throw scrapeError;
    } finally {
      await this.closeBrowser(browser, log);
    }
  }

  private async launchBrowser(): Promise<Browser> {
    try {
      return await chromium.launch({
        headless: this.config.browser.headless,
        args: getBrowserArgs(),
      });
    } catch (error) {
      throw new ScrapeError(
        ScrapeErrorType.BROWSER_ERROR,
        `Browser launch failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  private async openPage(browser: Browser): Promise<Page> {
    try {
      const context = await browser.newContext({
        viewport: this.config.browser.viewport,
        locale: "en-US",
      });
      return await context.newPage();
    } catch (error) {
      throw new ScrapeError(
        ScrapeErrorType.BROWSER_ERROR,
        `Browser context creation failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  private createContainer(page: Page, mode: ReviewViewMode): IReviewContainer {
    const scroll = this.config.scroll;

    if (mode === "full_screen") {
      const fullScreen = this.siteConfig.full_screen;
      return new PlaywrightReviewContainer(
        page,
        { container: fullScreen.container, item: fullScreen.item },
        new FullScreenReviewParser(fullScreen.fields),
        {
          wheelDownPx: scroll.wheel_down_px,
          wheelUpPx: scroll.wheel_up_px,
          pauseMs: scroll.pause_ms,
          settleMs: scroll.settle_ms,
        },
        this.htmlDump,
      );
    }

    const dialog = this.siteConfig.dialog;
    return new PlaywrightReviewContainer(
      page,
      { container: dialog.container, item: dialog.item },
      new DialogReviewParser(dialog),
      {
        wheelDownPx: scroll.wheel_down_px,
        wheelUpPx: scroll.dialog_wheel_up_px,
        pauseMs: scroll.pause_ms,
        settleMs: scroll.settle_ms,
      },
      this.htmlDump,
    );
  }

  /**
   * 리소스 정리 (context → browser 순)
   */
  private async closeBrowser(browser: Browser | null, log: Logger): Promise<void> {
    if (!browser) {
      return;
    }
    try {
      for (const context of browser.contexts()) {
        await context.close();
      }
      await browser.close();
      log.debug("브라우저 종료");
    } catch (error) {
      log.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "브라우저 종료 실패",
      );
    }
  }
}
