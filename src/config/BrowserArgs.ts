/**
 * Browser Launch Arguments
 *
 * SOLID 원칙:
 * - SRP: Browser 실행 인자 관리만 담당
 *
 * 목적:
 * - Stealth 설정과 창 설정 분리
 * - 실행 환경(Docker / 로컬)별 조합
 */

export const BROWSER_ARGS = {
  /**
   * Stealth 플래그 (봇 탐지 우회)
   * - 자동화 제어 표시 제거
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * 창 설정 (headful 실행 시 최대화)
   */
  WINDOW: ["--start-maximized", "--lang=en-US"],

  /**
   * Sandbox 플래그 (Docker 환경)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage"],

  /**
   * 로컬 실행 조합 (Window + Stealth)
   */
  get DEFAULT(): string[] {
    return [...this.WINDOW, ...this.STEALTH];
  },

  /**
   * 컨테이너 실행 조합 (Sandbox + Window + Stealth)
   */
  get CONTAINER(): string[] {
    return [...this.SANDBOX, ...this.WINDOW, ...this.STEALTH];
  },
};

/**
 * 실행 환경에 맞는 인자 선택 (BROWSER_SANDBOX=false → 컨테이너용)
 */
export function getBrowserArgs(): string[] {
  return process.env.BROWSER_SANDBOX === "false"
    ? BROWSER_ARGS.CONTAINER
    : BROWSER_ARGS.DEFAULT;
}
