#!/usr/bin/env node
// src/main.ts — digest semanal de uma database do Notion
//
// Fluxo:
// 1) config (.env) + flags
// 2) busca TODAS as páginas da database (paginado, sequencial)
// 3) classifica por semana (project | monthly | iso)
// 4) sem --week: resumo por semana; com --week N: conteúdo completo da semana N
//
// --pages lista as propriedades de cada página; --page <id> mostra uma página só.
//
// Uso:
//   node dist/src/main.js
//   node dist/src/main.js --policy monthly
//   node dist/src/main.js --anchor 2025-09-01 --week 3 --depth 4
//   node dist/src/main.js --week 2 --json
//   node dist/src/main.js --pages
//   node dist/src/main.js --page <page-id> --depth 2

import "dotenv/config";

import { loadConfig, parseAnchorDate, parseNonNegativeInt } from "./config.js";
import { errorMessage } from "./domain/errors.js";
import type { NotionDatabase, NotionDocument } from "./domain/notion.js";
import type { WeekRange } from "./domain/week.js";
import { fetchTree } from "./notion/blockTree.js";
import { NotionClient } from "./notion/notionClient.js";
import { describePolicy, formatIsoDate, parseWeekPolicy } from "./utils/dateUtils.js";
import { formatPageProperties, getPageTitle, renderBlocks } from "./utils/renderers.js";
import { EMPTY_CONTENT, buildWeekDetails, formatWeekDetails, type WeekDetailEntry } from "./weekly/weekDetails.js";
import { WeeklyAggregator } from "./weekly/weeklyAggregator.js";

// ─────────────────────────────────────────────────────────────
// ARGS
// ─────────────────────────────────────────────────────────────

const rawArgs = process.argv.slice(2);
const flagJson = rawArgs.includes("--json");
const flagPages = rawArgs.includes("--pages");

function flagValue(name: string): string | undefined {
  const inline = rawArgs.find((a) => a.startsWith(`--${name}=`));
  if (inline) return inline.slice(name.length + 3);

  const idx = rawArgs.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  const next = rawArgs[idx + 1];
  return next && !next.startsWith("--") ? next : undefined;
}

// ─────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────

function printLines(lines: string[]): void {
  for (const line of lines) console.log(line);
}

function printDatabaseSummary(db: NotionDatabase, totalPages: number): void {
  console.log("=".repeat(60));
  console.log("📊 Database do Notion");
  console.log("=".repeat(60));
  console.log(`Título: ${db.title ?? "Sem título"}`);
  console.log(`Criada em: ${db.createdTime}`);
  console.log(`URL: ${db.url}`);
  console.log(`Páginas: ${totalPages}`);

  const props = Object.entries(db.propertyTypes);
  if (props.length > 0) {
    console.log(`\nPropriedades (${props.length}):`);
    for (const [name, type] of props) console.log(`  • ${name} (${type})`);
  }
  console.log("");
}

function printPageInfo(doc: NotionDocument, pageNumber: number): void {
  console.log(`\n${"=".repeat(50)}`);
  console.log(`Página ${pageNumber}`);
  console.log("=".repeat(50));
  console.log(`ID: ${doc.id}`);
  console.log(`Criada em: ${doc.createdTime}`);
  console.log(`Editada em: ${doc.lastEditedTime ?? "N/A"}`);
  console.log(`URL: ${doc.url}`);
  console.log("-".repeat(50));

  const props = Object.entries(formatPageProperties(doc));
  if (props.length === 0) {
    console.log("Propriedades: nenhuma");
    return;
  }
  console.log("Propriedades:");
  for (const [key, value] of props) console.log(`  ${key}: ${value}`);
}

function rangeToJson(range: WeekRange | undefined): { start: string; end: string } | null {
  return range ? { start: formatIsoDate(range.start), end: formatIsoDate(range.end) } : null;
}

function documentToJson(doc: NotionDocument) {
  return {
    id: doc.id,
    title: getPageTitle(doc),
    date: doc.date,
    url: doc.url,
    properties: formatPageProperties(doc),
  };
}

// ─────────────────────────────────────────────────────────────
// MAIN
// ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadConfig();

  const policyFlag = flagValue("policy");
  const anchorFlag = flagValue("anchor");
  const depthFlag = flagValue("depth");
  const weekFlag = flagValue("week");

  const policy = policyFlag ? parseWeekPolicy(policyFlag) : config.policy;
  const anchor = anchorFlag ? parseAnchorDate(anchorFlag) : config.projectStart;
  const maxDepth = depthFlag ? parseNonNegativeInt(depthFlag, "--depth") : config.maxDepth;
  const week = weekFlag !== undefined ? parseNonNegativeInt(weekFlag, "--week") : undefined;
  const databaseId = flagValue("database") ?? config.databaseId;
  const pageId = flagValue("page");

  const client = new NotionClient({
    apiKey: config.apiKey,
    version: config.notionVersion,
    timeoutMs: config.timeoutMs,
  });

  if (pageId) {
    const page = await client.getPage(pageId);
    const tree = await fetchTree(client, page.id, maxDepth);
    if (flagJson) {
      console.log(JSON.stringify({ ...documentToJson(page), content: renderBlocks(tree.blocks) }, null, 2));
      return;
    }
    printPageInfo(page, 1);
    console.log(renderBlocks(tree.blocks) || EMPTY_CONTENT);
    return;
  }

  // Falha aqui é fatal: sem a lista de páginas não há o que classificar.
  const pages = await client.queryDatabaseAll(databaseId);

  const aggregator = new WeeklyAggregator({ policy, params: { anchor } });
  aggregator.classify(pages);

  if (!flagJson) {
    const db = await client.getDatabase(databaseId);
    printDatabaseSummary(db, pages.length);
    printLines(aggregator.describe());
    console.log("");
    if (flagPages) pages.forEach((page, i) => printPageInfo(page, i + 1));
  }

  if (week === undefined) {
    if (flagJson) {
      console.log(
        JSON.stringify(
          {
            policy,
            policyDescription: describePolicy(policy),
            anchor: formatIsoDate(anchor),
            weeks: aggregator.getAvailableWeeks().map((w) => {
              const bucket = aggregator.getWeek(w);
              return {
                week: w,
                range: rangeToJson(bucket.range),
                documents: bucket.documents.map(documentToJson),
              };
            }),
          },
          null,
          2
        )
      );
    } else {
      printLines(aggregator.formatWeeklySummary());
      console.log(`\n💡 Semanas disponíveis: ${aggregator.getAvailableWeeks().join(", ") || "nenhuma"}`);
    }
    return;
  }

  const bucket = aggregator.getWeek(week);
  const entries: WeekDetailEntry[] = await buildWeekDetails(client, bucket, maxDepth);

  if (flagJson) {
    console.log(
      JSON.stringify(
        {
          policy,
          week,
          reportRange: rangeToJson(aggregator.reportRange(week)),
          entries: entries.map((e) => ({
            ...e,
            failures: e.failures.map((f) => ({
              blockId: f.blockId,
              depth: f.depth,
              error: errorMessage(f.error),
            })),
          })),
        },
        null,
        2
      )
    );
    return;
  }

  printLines(formatWeekDetails(bucket, entries));
}

main().catch((err: unknown) => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exitCode = 1;
});
