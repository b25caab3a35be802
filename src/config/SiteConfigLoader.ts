/**
 * 사이트 셀렉터 설정 로더 (config/sites/*.yaml)
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: 사이트 YAML 로드 + 검증만 담당
 * - OCP: 셀렉터 변경 시 YAML만 수정
 */

import * as path from "path";
import { SiteConfig, SiteConfigSchema } from "@/core/domain/SiteConfig";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { formatZodIssues, readYamlFile } from "./ConfigLoader";
import { PATH_CONFIG, SCRAPER_CONFIG } from "./constants";

export class SiteConfigLoader {
  private static instance: SiteConfigLoader;
  private configCache: Map<string, SiteConfig> = new Map();

  private constructor() {}

  static getInstance(): SiteConfigLoader {
    if (!SiteConfigLoader.instance) {
      SiteConfigLoader.instance = new SiteConfigLoader();
    }
    return SiteConfigLoader.instance;
  }

  /**
   * 사이트 설정 로드
   * @param site - sites/{site}.yaml
   */
  loadSite(site: string = SCRAPER_CONFIG.DEFAULT_SITE): SiteConfig {
    const cached = this.configCache.get(site);
    if (cached) {
      return cached;
    }

    const configPath = path.join(__dirname, PATH_CONFIG.SITES_DIR, `${site}.yaml`);
    const parsed = SiteConfigSchema.safeParse(readYamlFile(configPath));
    if (!parsed.success) {
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_INVALID,
        `Invalid site config (${site}): ${formatZodIssues(parsed.error)}`,
      );
    }
    if (parsed.data.site !== site) {
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_INVALID,
        `Site id mismatch: expected ${site}, got ${parsed.data.site}`,
      );
    }

    this.configCache.set(site, parsed.data);
    return parsed.data;
  }

  /**
   * 캐시 클리어 (테스트용)
   */
  clearCache(): void {
    this.configCache.clear();
  }
}
