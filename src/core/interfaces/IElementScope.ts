/**
 * DOM 요소 읽기 인터페이스
 *
 * 요소 하나를 기준으로 하위 셀렉터 값을 읽음
 * 요소가 없거나 stale이면 throw하지 않고 빈 값 반환 (null, [], 0)
 */

export interface IElementScope {
  /** 첫 번째 일치 요소의 textContent */
  text(selector: string): Promise<string | null>;

  /** 모든 일치 요소의 textContent */
  texts(selector: string): Promise<string[]>;

  /** 첫 번째 일치 요소의 속성값 */
  attribute(selector: string, name: string): Promise<string | null>;

  /**
   * 모든 일치 요소의 속성값
   * 요소마다 names 순서대로 처음 값이 있는 속성 사용, 모두 없는 요소는 제외
   */
  attributes(selector: string, names: readonly string[]): Promise<string[]>;

  /** 일치 요소 수 */
  count(selector: string): Promise<number>;

  /** 스코프 요소 자체의 outerHTML (디버그 덤프용) */
  html(): Promise<string | null>;
}
