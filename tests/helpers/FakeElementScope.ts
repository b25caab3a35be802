/**
 * 테스트용 IElementScope (셀렉터 → 노드 목록 매핑)
 */

import type { IElementScope } from "@/core/interfaces/IElementScope";

export interface FakeNode {
  text?: string;
  attributes?: Record<string, string>;
}

export class FakeElementScope implements IElementScope {
  private readonly nodes: Map<string, FakeNode[]>;
  /** 조회된 셀렉터 순서 */
  readonly queried: string[] = [];

  constructor(nodes: Record<string, FakeNode | FakeNode[]>, private readonly outerHtml: string | null = null) {
    this.nodes = new Map(
      Object.entries(nodes).map(([selector, value]) => [
        selector,
        Array.isArray(value) ? value : [value],
      ]),
    );
  }

  async text(selector: string): Promise<string | null> {
    return this.find(selector)[0]?.text ?? null;
  }

  async texts(selector: string): Promise<string[]> {
    return this.find(selector).map((node) => node.text ?? "");
  }

  async attribute(selector: string, name: string): Promise<string | null> {
    return this.find(selector)[0]?.attributes?.[name] ?? null;
  }

  async attributes(selector: string, names: readonly string[]): Promise<string[]> {
    return this.find(selector).flatMap((node) => {
      const value = names.map((name) => node.attributes?.[name]).find(Boolean);
      return value === undefined ? [] : [value];
    });
  }

  async count(selector: string): Promise<number> {
    return this.find(selector).length;
  }

  async html(): Promise<string | null> {
    return this.outerHtml;
  }

  private find(selector: string): FakeNode[] {
    this.queried.push(selector);
    return this.nodes.get(selector) ?? [];
  }
}
