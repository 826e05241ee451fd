// src/config.ts
//
// Configuração a partir do ambiente (o .env é carregado pelo main via "dotenv/config").
//
// Requer:
// - NOTION_API_KEY
// - NOTION_DATABASE_ID
//
// Opcional:
// - NOTION_API_VERSION   (default: 2022-06-28)
// - WEEK_POLICY          (project | monthly | iso, default: project)
// - PROJECT_START_DATE   (YYYY-MM-DD, default: 2025-07-01)
// - BLOCK_TREE_MAX_DEPTH (default: 10)
// - NOTION_TIMEOUT_MS    (default: 30000)

import { z } from "zod";

import { ConfigError, ValidationError } from "./domain/errors.js";
import type { CalendarDate, WeekPolicy } from "./domain/week.js";
import { DEFAULT_MAX_DEPTH } from "./notion/blockTree.js";
import { DEFAULT_NOTION_VERSION, DEFAULT_TIMEOUT_MS } from "./notion/notionClient.js";
import { parseNotionDate, parseWeekPolicy } from "./utils/dateUtils.js";

export const DEFAULT_PROJECT_START = "2025-07-01";

export interface AppConfig {
  apiKey: string;
  databaseId: string;
  notionVersion: string;
  timeoutMs: number;
  policy: WeekPolicy;
  projectStart: CalendarDate;
  maxDepth: number;
}

// string vazia no .env conta como "não definido"
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  NOTION_API_KEY: optionalString,
  NOTION_DATABASE_ID: optionalString,
  NOTION_API_VERSION: optionalString,
  WEEK_POLICY: optionalString,
  PROJECT_START_DATE: optionalString,
  BLOCK_TREE_MAX_DEPTH: optionalString,
  NOTION_TIMEOUT_MS: optionalString,
});

function requireVar(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigError(`[config] Missing env var ${name}.`);
  }
  return value;
}

export function parseAnchorDate(raw: string): CalendarDate {
  const d = parseNotionDate(raw);
  if (!d) {
    throw new ValidationError(`Data de início inválida: "${raw}" (use YYYY-MM-DD)`);
  }
  return d;
}

export function parseNonNegativeInt(raw: string, name: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError(`${name} deve ser um inteiro >= 0 (recebido: "${raw}")`);
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const vars = EnvSchema.parse(env);

  return {
    apiKey: requireVar(vars.NOTION_API_KEY, "NOTION_API_KEY"),
    databaseId: requireVar(vars.NOTION_DATABASE_ID, "NOTION_DATABASE_ID"),
    notionVersion: vars.NOTION_API_VERSION ?? DEFAULT_NOTION_VERSION,
    timeoutMs: vars.NOTION_TIMEOUT_MS
      ? parseNonNegativeInt(vars.NOTION_TIMEOUT_MS, "NOTION_TIMEOUT_MS")
      : DEFAULT_TIMEOUT_MS,
    policy: parseWeekPolicy(vars.WEEK_POLICY ?? "project"),
    projectStart: parseAnchorDate(vars.PROJECT_START_DATE ?? DEFAULT_PROJECT_START),
    maxDepth: vars.BLOCK_TREE_MAX_DEPTH
      ? parseNonNegativeInt(vars.BLOCK_TREE_MAX_DEPTH, "BLOCK_TREE_MAX_DEPTH")
      : DEFAULT_MAX_DEPTH,
  };
}
