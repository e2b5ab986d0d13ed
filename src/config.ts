/**
 * 실행 설정
 * 환경 변수(.env 포함)를 읽어 검증한 뒤, 각 실행기에 명시적으로 넘긴다.
 */

import { z } from 'zod';
import { isPageSelector } from '../lib/page-selector.js';

export const DEFAULT_PDF_URL = 'https://www.mhlw.go.jp/content/000491511.pdf';
export const DEFAULT_HTML_URL = 'https://www.mhlw.go.jp/web/t_doc?dataId=81aa1263&dataType=0';
export const DEFAULT_SHEET_TITLE = '更新情報一覧';

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      if (['true', '1', 'yes'].includes(value)) return true;
      if (['false', '0', 'no'].includes(value)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true/false, got "${value}"` });
      return z.NEVER;
    });

const pageList = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (!value || !value.trim()) return [];
    const pages: number[] = [];
    for (const part of value.split(',')) {
      const page = Number(part.trim());
      if (!Number.isInteger(page) || page < 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid page number "${part.trim()}"` });
        return z.NEVER;
      }
      pages.push(page);
    }
    return pages;
  });

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

export const configSchema = z.object({
  PDF_URL: z.string().url().default(DEFAULT_PDF_URL),
  HTML_URL: z.string().url().default(DEFAULT_HTML_URL),
  SOURCE_KIND: z.enum(['pdf', 'html']).default('pdf'),
  PAGES: z
    .string()
    .trim()
    .min(1)
    .refine(isPageSelector, value => ({ message: `invalid page selector "${value}"` }))
    .default('all'),
  EXCLUDE_PAGES: pageList,
  USE_AUTO_PAGE_RANGE: booleanFlag(false),
  AUTO_START_PAGE: z.coerce.number().int().min(1).default(2),
  IFRAME_FIRST: booleanFlag(true),
  SPREADSHEET_ID: optionalText,
  SHEET_TITLE: z.string().trim().min(1).default(DEFAULT_SHEET_TITLE),
  GOOGLE_APPLICATION_CREDENTIALS: optionalText,
  SAVE_JSON_ALL: booleanFlag(false),
  JSON_DIR: z.string().trim().min(1).default('./json_out'),
  JSON_ALL_FILENAME: z.string().trim().min(1).default('ccc_ALL.json'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  PORT: z.coerce.number().int().positive().default(8787),
});

export type SourceKind = 'pdf' | 'html';

export type AppConfig = {
  pdfUrl: string;
  htmlUrl: string;
  sourceKind: SourceKind;
  pages: string;
  excludePages: number[];
  useAutoPageRange: boolean;
  autoStartPage: number;
  iframeFirst: boolean;
  spreadsheetId?: string;
  sheetTitle: string;
  credentialsFile?: string;
  saveJson: boolean;
  jsonDir: string;
  jsonFilename: string;
  fetchTimeoutMs: number;
  port: number;
};

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const c = parsed.data;
  return Object.freeze({
    pdfUrl: c.PDF_URL,
    htmlUrl: c.HTML_URL,
    sourceKind: c.SOURCE_KIND,
    pages: c.PAGES,
    excludePages: c.EXCLUDE_PAGES,
    useAutoPageRange: c.USE_AUTO_PAGE_RANGE,
    autoStartPage: c.AUTO_START_PAGE,
    iframeFirst: c.IFRAME_FIRST,
    spreadsheetId: c.SPREADSHEET_ID,
    sheetTitle: c.SHEET_TITLE,
    credentialsFile: c.GOOGLE_APPLICATION_CREDENTIALS,
    saveJson: c.SAVE_JSON_ALL,
    jsonDir: c.JSON_DIR,
    jsonFilename: c.JSON_ALL_FILENAME,
    fetchTimeoutMs: c.FETCH_TIMEOUT_MS,
    port: c.PORT,
  });
}
