/**
 * 리뷰 페이지 네비게이터
 *
 * 역할:
 * - 검색어 흐름: google.com → 검색 → (영어 전환) → 리뷰 버튼
 * - URL 흐름: 장소 페이지 → Reviews 탭
 * - 리뷰 출처 필터 (Google), 정렬 선택
 *
 * SOLID 원칙:
 * - SRP: 페이지 이동/클릭만 담당 (추출 X)
 */

import type { Page } from "playwright";
import type { Logger } from "@/config/logger";
import { SCRAPER_CONFIG } from "@/config/constants";
import type { SortBy } from "@/core/domain/ScrapeInput";
import type { ReviewViewMode, SiteConfig } from "@/core/domain/SiteConfig";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";

type WaitState = "attached" | "visible";

export class ReviewPageNavigator {
  constructor(
    private readonly config: SiteConfig,
    private readonly log: Logger,
  ) {}

  /**
   * 검색어로 장소 검색 후 리뷰 열기
   * @returns 리뷰 표시 방식
   */
  async openFromSearch(page: Page, placeName: string): Promise<ReviewViewMode> {
    const search = this.config.search;

    await this.step("검색 페이지 이동", () =>
      page.goto(search.url, { timeout: SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS }),
    );
    await this.waitOutBlockedNetwork(page);
    await page.waitForTimeout(SCRAPER_CONFIG.UI_SETTLE_MS);

    await this.step("검색어 입력", async () => {
      await page.locator(search.search_box).first().fill(placeName);
      await page.keyboard.press("Enter");
    });
    await page.waitForTimeout(SCRAPER_CONFIG.UI_SETTLE_MS);

    const englishLink = page.locator(search.english_link).first();
    if (await this.isPresent(page, search.english_link, "visible")) {
      this.log.info("영어 페이지로 전환");
      await englishLink.click();
      await page.waitForTimeout(SCRAPER_CONFIG.UI_SETTLE_MS);
    }

    // 리뷰가 많으면 전체 화면, 적으면 다이얼로그
    if (await this.isPresent(page, search.full_screen_button, "visible")) {
      this.log.info("리뷰 전체 화면 모드");
      await this.step("리뷰 버튼 클릭", () =>
        page
          .locator(search.full_screen_button)
          .first()
          .click({ timeout: SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS }),
      );
      return "full_screen";
    }

    if (await this.isPresent(page, search.dialog_button, "visible")) {
      this.log.info("리뷰 다이얼로그 모드");
      await this.step("리뷰 버튼 클릭", async () => {
        await page
          .locator(search.dialog_button)
          .first()
          .click({ timeout: SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS });
        await page.setViewportSize(SCRAPER_CONFIG.DIALOG_VIEWPORT);
      });
      return "dialog";
    }

    throw new ScrapeError(
      ScrapeErrorType.NAVIGATION_FAILED,
      `Review button not found for "${placeName}"`,
    );
  }

  /**
   * 장소 페이지 URL로 이동 후 Reviews 탭 열기 (전체 화면)
   */
  async openFromUrl(page: Page, pageUrl: string): Promise<ReviewViewMode> {
    await this.step("장소 페이지 이동", () =>
      page.goto(pageUrl, { timeout: SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS }),
    );

    const reviewsTab = this.config.page_url.reviews_tab;
    if (!(await this.isPresent(page, reviewsTab, "visible"))) {
      throw new ScrapeError(
        ScrapeErrorType.NAVIGATION_FAILED,
        `Reviews tab not found: ${pageUrl}`,
      );
    }

    await this.step("Reviews 탭 클릭", () =>
      page.locator(reviewsTab).first().click({ timeout: SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS }),
    );
    await page.waitForTimeout(SCRAPER_CONFIG.UI_SETTLE_MS);
    return "full_screen";
  }

  /**
   * 평점 요약 영역 로딩 대기
   */
  async waitForSummary(page: Page, mode: ReviewViewMode): Promise<void> {
    const selector =
      mode === "full_screen"
        ? this.config.full_screen.summary.rating_label
        : this.config.dialog.summary.rating_label;

    await this.step("평점 요약 대기", () =>
      page
        .locator(selector)
        .first()
        .waitFor({ state: "attached", timeout: SCRAPER_CONFIG.SUMMARY_TIMEOUT_MS }),
    );
  }

  /**
   * 리뷰 출처 Google로 제한 (전체 화면 모드, 필터가 없으면 건너뜀)
   */
  async selectGoogleSource(page: Page): Promise<void> {
    const filter = this.config.full_screen.source_filter;

    await page.waitForTimeout(SCRAPER_CONFIG.REVIEWS_LOAD_WAIT_MS);
    if (!(await this.isPresent(page, filter.listbox, "visible"))) {
      this.log.warn("리뷰 출처 필터 없음, 전체 출처 수집");
      return;
    }

    await this.step("리뷰 출처 선택", async () => {
      await page.locator(filter.listbox).first().click();
      await page.waitForTimeout(SCRAPER_CONFIG.UI_SETTLE_MS);
      await page.locator(filter.option).first().click();
      await page.waitForTimeout(SCRAPER_CONFIG.UI_SETTLE_MS);
    });
  }

  /**
   * 정렬 선택
   */
  async selectSort(page: Page, mode: ReviewViewMode, sortBy: SortBy): Promise<void> {
    const sort = mode === "full_screen" ? this.config.full_screen.sort : this.config.dialog.sort;
    const label = sort.labels[sortBy];

    await this.step(`정렬 선택 (${label})`, async () => {
      await page.locator(sort.trigger).first().click();
      await page.waitForTimeout(SCRAPER_CONFIG.UI_SETTLE_MS);
      await page.locator(sort.option.replace("{label}", label)).first().click();
      await page.waitForTimeout(SCRAPER_CONFIG.UI_SETTLE_MS);
    });
  }

  /**
   * 네트워크 차단 안내 페이지: 검색창이 나타날 때까지 대기
   */
  private async waitOutBlockedNetwork(page: Page): Promise<void> {
    const { blocked_marker: marker, search_box: searchBox } = this.config.search;
    if (!(await page.content()).includes(marker)) {
      return;
    }

    for (;;) {
      this.log.warn("네트워크 차단 페이지 감지, 검색창 대기 중 (수동 확인 필요)");
      await page.waitForTimeout(SCRAPER_CONFIG.BLOCKED_POLL_MS);
      if (await page.locator(searchBox).first().isVisible()) {
        this.log.info("검색창 확인, 진행");
        return;
      }
    }
  }

  private async isPresent(page: Page, selector: string, state: WaitState): Promise<boolean> {
    try {
      await page
        .locator(selector)
        .first()
        .waitFor({ state, timeout: SCRAPER_CONFIG.ELEMENT_TIMEOUT_MS });
      return true;
    } catch (error) {
      this.log.debug(
        { selector, error: error instanceof Error ? error.message : String(error) },
        "요소 없음",
      );
      return false;
    }
  }

  /**
   * 단계 실행 (실패 시 NAVIGATION_FAILED)
   */
  private async step<T>(name: string, action: () => Promise<T>): Promise<T> {
    this.log.debug({ step: name }, "네비게이션 단계 시작");
    try {
      return await action();
    } catch (error) {
      throw new ScrapeError(
        ScrapeErrorType.NAVIGATION_FAILED,
        `Navigation step failed (${name}): ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }
}
