/**
 * Playwright 기반 리뷰 컨테이너
 *
 * 스크롤: 마우스 휠로 끝까지 내린 뒤 살짝 올려 추가 로딩 트리거
 */

import type { Locator, Page } from "playwright";
import type { ReviewRecord } from "@/core/domain/ReviewRecord";
import type { IReviewContainer } from "@/core/interfaces/IReviewContainer";
import type { IReviewParser } from "@/core/interfaces/IReviewParser";
import type { HtmlDumpService } from "@/utils/HtmlDumpService";
import { PlaywrightElementScope } from "./PlaywrightElementScope";

export interface ContainerScrollOptions {
  wheelDownPx: number;
  wheelUpPx: number;
  /** 휠 다운 후 대기 (ms) */
  pauseMs: number;
  /** 휠 업 후 로딩 대기 (ms) */
  settleMs: number;
}

export interface ContainerSelectors {
  container: string;
  /** 컨테이너 기준 리뷰 요소 셀렉터 */
  item: string;
}

export class PlaywrightReviewContainer implements IReviewContainer {
  private readonly container: Locator;

  constructor(
    private readonly page: Page,
    private readonly selectors: ContainerSelectors,
    private readonly parser: IReviewParser,
    private readonly scroll: ContainerScrollOptions,
    private readonly htmlDump?: HtmlDumpService,
  ) {
    this.container = page.locator(selectors.container).first();
  }

  async countRendered(): Promise<number> {
    return this.items().count();
  }

  async parseAt(index: number): Promise<ReviewRecord | null> {
    const scope = new PlaywrightElementScope(this.items().nth(index));
    const record = await this.parser.parse(scope);

    if (record === null && this.htmlDump) {
      await this.htmlDump.dump(
        await scope.html(),
        `FAILED_REVIEW_${index}`,
        "username or rating not found",
      );
    }
    return record;
  }

  async scrollForMore(): Promise<void> {
    await this.page.mouse.wheel(0, this.scroll.wheelDownPx);
    await this.page.waitForTimeout(this.scroll.pauseMs);
    await this.page.mouse.wheel(0, -this.scroll.wheelUpPx);
    await this.page.waitForTimeout(this.scroll.settleMs);
  }

  async scrollExtent(): Promise<number> {
    return this.container.evaluate((element) => element.scrollHeight);
  }

  private items(): Locator {
    return this.container.locator(this.selectors.item);
  }
}
