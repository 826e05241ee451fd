// src/weekly/weeklyAggregator.ts
//
// Agrupa as páginas da database em "buckets" de semana.
//
// Regras-chave:
// - classify() SEMPRE limpa e reconstrói tudo (nunca faz merge com o run anterior)
// - Página sem data (ou com data malformada) fica fora de todos os buckets, sem erro
// - Dentro do bucket, a ordem é a ordem de entrada
// - setPolicy() NÃO reclassifica: quem chama decide quando rodar classify() de novo
// - Este objeto não é thread-safe (um dono só)

import { NotFoundError } from "../domain/errors.js";
import type { NotionDocument } from "../domain/notion.js";
import type {
  WeekAssignment,
  WeekBucket,
  WeekPolicy,
  WeekPolicyParams,
  WeekPreview,
  WeekRange,
} from "../domain/week.js";
import {
  computeWeekNumber,
  describePolicy,
  formatDisplayDate,
  formatIsoDate,
  formatRange,
  getCurrentProjectWeek,
  getIsoWeek,
  getWeekRange,
  parseNotionDate,
  parseWeekPolicy,
  today,
  weekRange,
} from "../utils/dateUtils.js";
import { getPageTitle } from "../utils/renderers.js";

export const PREVIEW_LIMIT = 3;

export interface WeekSetting {
  policy: WeekPolicy;
  params: WeekPolicyParams;
}

// ─────────────────────────────────────────────────────────────
// Classificação (função livre)
// ─────────────────────────────────────────────────────────────

export function assignWeek(
  doc: NotionDocument,
  policy: WeekPolicy,
  params: WeekPolicyParams
): WeekAssignment | null {
  const parsed = parseNotionDate(doc.date);
  if (!doc.date || !parsed) return null;

  const weekNumber = computeWeekNumber(parsed, policy, params);
  const assignment: WeekAssignment = {
    policy,
    weekNumber,
    originalDate: doc.date,
    displayDate: formatDisplayDate(parsed),
  };

  const range = weekRange(weekNumber, policy, params);
  if (range) assignment.range = range;
  if (policy === "iso") assignment.isoYear = getIsoWeek(parsed).year;

  return assignment;
}

/**
 * Classifica o conjunto inteiro de páginas.
 * Anexa `_week` em cada página datada e remove `_week` antigo das sem data,
 * assim nada de um run anterior sobrevive.
 */
export function classify(
  documents: NotionDocument[],
  policy: WeekPolicy,
  params: WeekPolicyParams
): Map<number, NotionDocument[]> {
  const buckets = new Map<number, NotionDocument[]>();

  for (const doc of documents) {
    const assignment = assignWeek(doc, policy, params);
    if (!assignment) {
      delete doc._week;
      continue;
    }

    doc._week = assignment;

    const bucket = buckets.get(assignment.weekNumber);
    if (bucket) bucket.push(doc);
    else buckets.set(assignment.weekNumber, [doc]);
  }

  return buckets;
}

// ─────────────────────────────────────────────────────────────
// Aggregator (estado: política ativa + buckets do último classify)
// ─────────────────────────────────────────────────────────────

export class WeeklyAggregator {
  private setting: WeekSetting;

  // política com que os buckets atuais foram calculados
  private classifiedWith: WeekSetting | null = null;
  private buckets = new Map<number, NotionDocument[]>();

  constructor(setting: WeekSetting) {
    this.setting = { policy: parseWeekPolicy(setting.policy), params: setting.params };
  }

  get policy(): WeekPolicy {
    return this.setting.policy;
  }

  get params(): WeekPolicyParams {
    return this.setting.params;
  }

  /** Troca a política ativa. Os buckets atuais ficam como estão até o próximo classify(). */
  setPolicy(policy: string, params: WeekPolicyParams = this.setting.params): void {
    this.setting = { policy: parseWeekPolicy(policy), params };
  }

  classify(documents: NotionDocument[]): Map<number, NotionDocument[]> {
    this.buckets = classify(documents, this.setting.policy, this.setting.params);
    this.classifiedWith = { ...this.setting };
    return new Map([...this.buckets].map(([week, docs]): [number, NotionDocument[]] => [week, [...docs]]));
  }

  getAvailableWeeks(): number[] {
    return [...this.buckets.keys()].sort((a, b) => a - b);
  }

  getWeek(week: number): WeekBucket<NotionDocument> {
    const documents = this.buckets.get(week);
    if (!documents) throw new NotFoundError(week);

    const bucket: WeekBucket<NotionDocument> = { week, documents: [...documents] };
    const range = this.rangeOf(week);
    if (range) bucket.range = range;
    return bucket;
  }

  previewWeeks(limit: number = PREVIEW_LIMIT): WeekPreview[] {
    return this.getAvailableWeeks().map((week) => {
      const docs = this.buckets.get(week) ?? [];
      const preview: WeekPreview = {
        week,
        count: docs.length,
        items: docs.slice(0, limit).map((doc) => ({
          title: getPageTitle(doc),
          displayDate: doc._week?.displayDate ?? "sem data",
        })),
        moreCount: Math.max(0, docs.length - limit),
      };
      const range = this.rangeOf(week);
      if (range) preview.range = range;
      return preview;
    });
  }

  /**
   * Período do relatório de uma semana: o intervalo da política "project"
   * quando existe; senão, da data mais antiga à mais recente do bucket.
   */
  reportRange(week: number): WeekRange {
    const range = this.rangeOf(week);
    if (range) return range;

    const dates = this.getWeek(week)
      .documents.map((doc) => parseNotionDate(doc.date))
      .filter((d): d is Date => d !== null)
      .sort((a, b) => a.getTime() - b.getTime());

    return { start: dates[0], end: dates[dates.length - 1] };
  }

  formatWeeklySummary(): string[] {
    const previews = this.previewWeeks();
    if (previews.length === 0) return ["📭 Nenhuma página classificada."];

    const policy = this.classifiedWith?.policy ?? this.setting.policy;
    const lines = [`📅 Páginas por semana — ${describePolicy(policy)}`];

    for (const p of previews) {
      let header = `🗓️  Semana ${p.week} (${p.count} página${p.count === 1 ? "" : "s"})`;
      if (p.range) header += ` — ${formatRange(p.range)}`;

      // ISO: o bucket ignora o ano, então avisamos quando anos diferentes colidem
      const isoYears = this.isoYearsOf(p.week);
      if (isoYears.length > 1) header += ` ⚠️ anos ISO misturados: ${isoYears.join(", ")}`;
      lines.push(header);

      for (const item of p.items) {
        lines.push(`    • ${item.displayDate}: ${item.title}`);
      }
      if (p.moreCount > 0) lines.push(`    ... +${p.moreCount} mais`);
    }

    return lines;
  }

  describe(now: Date = today()): string[] {
    const lines = [`📅 Cálculo de semana: ${describePolicy(this.setting.policy)}`];
    if (this.setting.policy !== "project") {
      lines.push(`📅 Semana corrente (seg–dom): ${formatRange(getWeekRange(now))}`);
      return lines;
    }

    const anchor = this.setting.params.anchor;
    const current = getCurrentProjectWeek(anchor, now);
    lines.push(`📍 Início do projeto: ${formatIsoDate(anchor)}`);
    lines.push(`🗓️  Semana atual do projeto: ${current}`);

    const range = weekRange(current, "project", this.setting.params);
    if (range) lines.push(`📅 Período da semana atual: ${formatRange(range)}`);

    return lines;
  }

  private isoYearsOf(week: number): number[] {
    const years = new Set<number>();
    for (const doc of this.buckets.get(week) ?? []) {
      if (doc._week?.isoYear !== undefined) years.add(doc._week.isoYear);
    }
    return [...years].sort((a, b) => a - b);
  }

  private rangeOf(week: number): WeekRange | undefined {
    if (!this.classifiedWith) return undefined;
    return weekRange(week, this.classifiedWith.policy, this.classifiedWith.params);
  }
}
