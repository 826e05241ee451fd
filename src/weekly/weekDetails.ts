// src/weekly/weekDetails.ts
//
// Conteúdo completo de uma semana: para cada página do bucket, busca a
// árvore de blocos e renderiza em texto.
// Falha numa página (raiz da árvore) não derruba as outras: vira `error` da entrada.

import { DigestError, errorMessage } from "../domain/errors.js";
import type { ContentStore, NotionDocument } from "../domain/notion.js";
import type { WeekBucket } from "../domain/week.js";
import { type BranchFailure, type FetchTreeOptions, fetchTree } from "../notion/blockTree.js";
import { getPageTitle, renderBlocks } from "../utils/renderers.js";

export const EMPTY_CONTENT = "📄 Conteúdo vazio.";

export interface WeekDetailEntry {
  pageId: string;
  title: string;
  displayDate: string;
  content: string;
  failures: BranchFailure[];
  error?: string;
}

export async function buildWeekDetails(
  store: ContentStore,
  bucket: WeekBucket<NotionDocument>,
  maxDepth: number,
  options: FetchTreeOptions = {}
): Promise<WeekDetailEntry[]> {
  const entries: WeekDetailEntry[] = [];

  for (const doc of bucket.documents) {
    const entry: WeekDetailEntry = {
      pageId: doc.id,
      title: getPageTitle(doc),
      displayDate: doc._week?.displayDate ?? "sem data",
      content: "",
      failures: [],
    };

    try {
      const tree = await fetchTree(store, doc.id, maxDepth, options);
      const rendered = renderBlocks(tree.blocks);
      entry.content = rendered.trim() ? rendered : EMPTY_CONTENT;
      entry.failures = tree.failures;
    } catch (err) {
      // só falhas do Notion viram erro da entrada; bug de código sobe
      if (!(err instanceof DigestError)) throw err;
      entry.error = errorMessage(err);
    }

    entries.push(entry);
  }

  return entries;
}

export function formatWeekDetails(bucket: WeekBucket<NotionDocument>, entries: WeekDetailEntry[]): string[] {
  const lines = [`📋 Semana ${bucket.week} — detalhes (${entries.length} página${entries.length === 1 ? "" : "s"})`];

  entries.forEach((entry, i) => {
    lines.push("");
    lines.push(`📄 ${i + 1}. ${entry.displayDate} - ${entry.title}`);
    lines.push("-".repeat(50));

    if (entry.error) {
      lines.push(`❌ Não foi possível obter o conteúdo: ${entry.error}`);
      return;
    }

    lines.push(entry.content);
    if (entry.failures.length > 0) {
      const ids = entry.failures.map((f) => f.blockId).join(", ");
      lines.push(`⚠️ Conteúdo incompleto: falha ao buscar filhos de ${ids}`);
    }
  });

  return lines;
}
