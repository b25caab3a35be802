/**
 * Playwright 기반 IElementScope 구현
 *
 * Locator 하나를 기준으로 하위 셀렉터 조회
 * 모든 조회는 짧은 타임아웃 + 에러 시 빈 값 반환 (DOMHelper 방식)
 */

import type { Locator } from "playwright";
import type { IElementScope } from "@/core/interfaces/IElementScope";

/** 하위 요소 조회 타임아웃 (ms) */
const READ_TIMEOUT_MS = 100;

export class PlaywrightElementScope implements IElementScope {
  constructor(
    private readonly root: Locator,
    private readonly timeoutMs: number = READ_TIMEOUT_MS,
  ) {}

  async text(selector: string): Promise<string | null> {
    try {
      const locator = this.root.locator(selector);
      if ((await locator.count()) === 0) {
        return null;
      }
      return await locator.first().textContent({ timeout: this.timeoutMs });
    } catch {
      return null;
    }
  }

  /** innerText 기준 (줄바꿈 유지) */
  async texts(selector: string): Promise<string[]> {
    try {
      return await this.root.locator(selector).allInnerTexts();
    } catch {
      return [];
    }
  }

  async attribute(selector: string, name: string): Promise<string | null> {
    try {
      const locator = this.root.locator(selector);
      if ((await locator.count()) === 0) {
        return null;
      }
      return await locator.first().getAttribute(name, { timeout: this.timeoutMs });
    } catch {
      return null;
    }
  }

  /** 요소별 속성 fallback (src 없으면 data-src) */
  async attributes(selector: string, names: readonly string[]): Promise<string[]> {
    try {
      const values = await this.root
        .locator(selector)
        .evaluateAll(
          (elements, attributeNames) =>
            elements.map((element) => {
              for (const attributeName of attributeNames) {
                const value = element.getAttribute(attributeName);
                if (value) return value;
              }
              return null;
            }),
          [...names],
        );
      return values.filter((value): value is string => value !== null);
    } catch {
      return [];
    }
  }

  async count(selector: string): Promise<number> {
    try {
      return await this.root.locator(selector).count();
    } catch {
      return 0;
    }
  }

  async html(): Promise<string | null> {
    try {
      return await this.root.evaluate((element) => element.outerHTML, undefined, {
        timeout: this.timeoutMs,
      });
    } catch {
      return null;
    }
  }
}
