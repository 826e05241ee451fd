import { describe, expect, it } from "vitest";

import type { Block, ContentStore, NotionDocument, Page } from "../domain/notion.js";
import type { WeekBucket } from "../domain/week.js";
import { parseNotionDate } from "../utils/dateUtils.js";
import { EMPTY_CONTENT, buildWeekDetails, formatWeekDetails } from "../weekly/weekDetails.js";
import { WeeklyAggregator } from "../weekly/weeklyAggregator.js";
import { InMemoryContentStore, doc, paragraph } from "./helpers.js";

const silent = { onBranchError: () => undefined };

function bucketOf(docs: NotionDocument[]): WeekBucket<NotionDocument> {
  const anchor = parseNotionDate("2025-07-01");
  if (!anchor) throw new Error("bad anchor fixture");
  const agg = new WeeklyAggregator({ policy: "project", params: { anchor } });
  agg.classify(docs);
  return agg.getWeek(1);
}

describe("buildWeekDetails", () => {
  it("renders each page and isolates a page whose content cannot be fetched", async () => {
    const store = new InMemoryContentStore(10);
    store.children.set("p1", [paragraph("x1", "Objetivo", true), paragraph("x2", "Resultado", true)]);
    store.children.set("x1", [paragraph("x1a", "detalhe")]);
    store.failing.add("x2");
    store.failing.add("p2");
    const bucket = bucketOf([doc("p1", "Kickoff", "2025-07-01"), doc("p2", "Retro", "2025-07-03"), doc("p3", "Vazio", "2025-07-04")]);

    const entries = await buildWeekDetails(store, bucket, 5, silent);

    expect(entries.map((e) => e.pageId)).toEqual(["p1", "p2", "p3"]);
    expect(entries[0].content).toBe("Objetivo\n  detalhe\nResultado");
    expect(entries[0].failures.map((f) => f.blockId)).toEqual(["x2"]);
    expect(entries[1].error).toBe("Notion API error 500: boom p2");
    expect(entries[2].content).toBe(EMPTY_CONTENT);

    expect(formatWeekDetails(bucket, entries)).toEqual([
      "📋 Semana 1 — detalhes (3 páginas)",
      "",
      "📄 1. 1/7 (ter) - Kickoff",
      "-".repeat(50),
      "Objetivo\n  detalhe\nResultado",
      "⚠️ Conteúdo incompleto: falha ao buscar filhos de x2",
      "",
      "📄 2. 3/7 (qui) - Retro",
      "-".repeat(50),
      "❌ Não foi possível obter o conteúdo: Notion API error 500: boom p2",
      "",
      "📄 3. 4/7 (sex) - Vazio",
      "-".repeat(50),
      EMPTY_CONTENT,
    ]);
  });

  it("lets errors that are not Notion failures propagate", async () => {
    const broken: ContentStore = {
      fetchChildPage(): Promise<Page<Block>> {
        return Promise.reject(new TypeError("cannot read properties of undefined"));
      },
      fetchCollectionPage(): Promise<Page<NotionDocument>> {
        return Promise.resolve({ items: [], nextCursor: null, hasMore: false });
      },
    };
    const bucket = bucketOf([doc("p1", "Kickoff", "2025-07-01")]);

    await expect(buildWeekDetails(broken, bucket, 5, silent)).rejects.toBeInstanceOf(TypeError);
  });
});
