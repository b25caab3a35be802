/**
 * AppConfig - 실행 설정 (config.yml)
 */

import { z } from "zod";

export const AppConfigSchema = z.object({
  output_dir: z.string().min(1),
  stop_criteria: z
    .object({
      username: z.string().nullish(),
      review_text: z.string().nullish(),
    })
    .nullish(),
  browser: z
    .object({
      headless: z.boolean().default(false),
      viewport: z
        .object({
          width: z.number().int().positive(),
          height: z.number().int().positive(),
        })
        .default({ width: 1920, height: 1080 }),
    })
    .default({}),
  scroll: z
    .object({
      wheel_down_px: z.number().int().positive().default(10000),
      /** 전체 화면 모드 역스크롤 (다이얼로그는 dialog_wheel_up_px) */
      wheel_up_px: z.number().int().nonnegative().default(200),
      dialog_wheel_up_px: z.number().int().nonnegative().default(50),
      pause_ms: z.number().int().nonnegative().default(200),
      settle_ms: z.number().int().nonnegative().default(2000),
      idle_iteration_limit: z.number().int().positive().default(5),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type BrowserConfig = AppConfig["browser"];
export type ScrollConfig = AppConfig["scroll"];
