/**
 * 실행 설정 로더 (config.yml)
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: YAML 파일 로드 + 스키마 검증만 담당
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import type { ZodError } from "zod";
import { AppConfig, AppConfigSchema } from "@/core/domain/AppConfig";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { SCRAPER_CONFIG } from "./constants";
import { logger } from "./logger";

/**
 * zod 검증 오류를 한 줄 메시지로 변환
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * YAML 파일 읽기 + 파싱
 * 파일 없음/문법 오류는 CONFIG_INVALID
 */
export function readYamlFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ScrapeError(
      ScrapeErrorType.CONFIG_INVALID,
      `Config file not found: ${filePath}`,
    );
  }

  try {
    return yaml.load(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ScrapeError(
      ScrapeErrorType.CONFIG_INVALID,
      `Failed to parse YAML: ${filePath}`,
      { cause: error },
    );
  }
}

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private configCache: Map<string, AppConfig> = new Map();

  private constructor() {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 설정 파일 로드 (상대 경로는 cwd 기준)
   */
  loadConfig(configPath: string = SCRAPER_CONFIG.DEFAULT_CONFIG_PATH): AppConfig {
    const resolvedPath = path.resolve(configPath);

    const cached = this.configCache.get(resolvedPath);
    if (cached) {
      return cached;
    }

    const raw = readYamlFile(resolvedPath);
    const parsed = AppConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_INVALID,
        `Invalid config (${resolvedPath}): ${formatZodIssues(parsed.error)}`,
      );
    }

    logger.debug(
      { configPath: resolvedPath, outputDir: parsed.data.output_dir },
      "[ConfigLoader] 설정 로드 완료",
    );

    this.configCache.set(resolvedPath, parsed.data);
    return parsed.data;
  }

  /**
   * 캐시 클리어 (테스트용)
   */
  clearCache(): void {
    this.configCache.clear();
  }
}
