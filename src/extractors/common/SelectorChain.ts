/**
 * Selector Chain
 *
 * 필드 하나에 대한 우선순위 셀렉터 목록
 * 앞에서부터 시도하여 처음으로 값이 나온 규칙의 결과 사용 (primary → fallback)
 */

import type { SelectorRule } from "@/core/domain/SiteConfig";
import type { IElementScope } from "@/core/interfaces/IElementScope";
import { TextNormalizer } from "./TextNormalizer";

export class SelectorChain {
  constructor(private readonly rules: readonly SelectorRule[]) {}

  /**
   * 첫 번째 값 (단일 필드용, 공백 정규화)
   */
  async resolve(scope: IElementScope): Promise<string | null> {
    for (const rule of this.rules) {
      const values = await this.readRule(scope, rule);
      const first = values.map((value) => TextNormalizer.clean(value)).find(Boolean);
      if (first) {
        return first;
      }
    }
    return null;
  }

  /**
   * 값 목록 (목록 필드용, 줄바꿈 유지)
   */
  async resolveAll(scope: IElementScope): Promise<string[]> {
    for (const rule of this.rules) {
      const values = (await this.readRule(scope, rule)).filter(
        (value) => value.trim().length > 0,
      );
      if (values.length > 0) {
        return values;
      }
    }
    return [];
  }

  private async readRule(scope: IElementScope, rule: SelectorRule): Promise<string[]> {
    if (rule.attribute) {
      const names = typeof rule.attribute === "string" ? [rule.attribute] : rule.attribute;
      if (rule.all) {
        return scope.attributes(rule.selector, names);
      }
      for (const name of names) {
        const value = await scope.attribute(rule.selector, name);
        if (value) {
          return [value];
        }
      }
      return [];
    }

    if (rule.all) {
      return scope.texts(rule.selector);
    }
    const value = await scope.text(rule.selector);
    return value === null ? [] : [value];
  }
}
