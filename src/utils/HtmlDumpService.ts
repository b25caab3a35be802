/**
 * HTML Dump Service
 *
 * SOLID 원칙:
 * - SRP: 디버그용 HTML 저장만 담당
 *
 * 목적:
 * - 파싱 실패한 리뷰 요소 HTML 보관 (셀렉터 수정 시 참고)
 */

import * as fs from "fs/promises";
import * as path from "path";
import { LOG_DIR, logger } from "@/config/logger";
import { PATH_CONFIG } from "@/config/constants";
import { getLocalDateString, getRunStamp } from "@/utils/timestamp";

export class HtmlDumpService {
  private readonly outputDir: string;

  constructor(outputDir?: string) {
    this.outputDir = outputDir || LOG_DIR;
  }

  /**
   * HTML 저장
   * 경로: outputDir/YYYY-MM-DD/html/{YYYY-MM-DD_HH-mm-ss}_{name}.html
   *
   * @returns 저장 경로 (실패 시 null)
   */
  async dump(html: string | null, name: string, note?: string): Promise<string | null> {
    if (!html) {
      return null;
    }

    try {
      const now = new Date();
      const dumpDir = path.join(
        this.outputDir,
        getLocalDateString(now),
        PATH_CONFIG.HTML_DUMP_DIR,
      );
      await fs.mkdir(dumpDir, { recursive: true });

      const safeName = name.replace(/[^\w.-]+/g, "_");
      const filepath = path.join(dumpDir, `${getRunStamp(now)}_${safeName}.html`);
      const content = note ? `<!-- ${note} -->\n\n${html}` : html;
      await fs.writeFile(filepath, content, "utf8");

      logger.debug({ filepath }, "HTML 덤프 저장 완료");
      return filepath;
    } catch (error) {
      // 덤프 실패는 무시 (수집 작업에 영향 주지 않음)
      logger.warn({ error, name }, "HTML 덤프 저장 실패 - 무시");
      return null;
    }
  }
}
