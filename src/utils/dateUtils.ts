// src/utils/dateUtils.ts
//
// Cálculo de semana para o digest semanal.
// Tudo aqui é puro: nenhuma data "global", a âncora do projeto entra
// sempre por parâmetro (WeekPolicyParams).
//
// As datas são CalendarDate (UTC meia-noite), então getUTCDay() é o dia
// da semana real da data do Notion, independente do TZ da máquina.
//
// Números de semana de políticas diferentes NÃO são comparáveis entre si.

import { ValidationError } from "../domain/errors.js";
import {
  WEEK_POLICIES,
  type CalendarDate,
  type WeekPolicy,
  type WeekPolicyParams,
  type WeekRange,
} from "../domain/week.js";

const DAY_MS = 86_400_000;

// getUTCDay(): 0 = domingo
const WEEKDAYS_PT = ["dom", "seg", "ter", "qua", "qui", "sex", "sáb"];

const POLICY_DESCRIPTIONS: Record<WeekPolicy, string> = {
  project: "Projeto (semanas contínuas desde a data de início)",
  monthly: "Mensal (semana 1 reinicia todo mês)",
  iso: "ISO 8601 (padrão internacional)",
};

// ─────────────────────────────────────────────────────────────
// Construção / parse
// ─────────────────────────────────────────────────────────────

export function toCalendarDate(year: number, month: number, day: number): CalendarDate {
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Converte a string de data do Notion ("2025-08-01" ou
 * "2025-08-01T09:30:00.000+09:00") numa CalendarDate.
 * Retorna null para vazio/malformado (inclusive datas impossíveis, ex. 2025-02-30).
 */
export function parseNotionDate(raw: string | null | undefined): CalendarDate | null {
  if (!raw) return null;

  const datePart = raw.trim().split("T")[0];
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(datePart);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const d = toCalendarDate(year, month, day);

  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d;
}

/** Descarta a hora: mesma data UTC, à meia-noite. */
export function startOfUtcDay(d: Date): CalendarDate {
  return toCalendarDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
}

export function formatIsoDate(d: CalendarDate): string {
  return d.toISOString().slice(0, 10);
}

export function addDays(d: CalendarDate, days: number): CalendarDate {
  return new Date(d.getTime() + days * DAY_MS);
}

export function diffDays(later: CalendarDate, earlier: CalendarDate): number {
  return Math.round((later.getTime() - earlier.getTime()) / DAY_MS);
}

/** Hoje como CalendarDate (data local da máquina). */
export function today(now: Date = new Date()): CalendarDate {
  return toCalendarDate(now.getFullYear(), now.getMonth() + 1, now.getDate());
}

// ─────────────────────────────────────────────────────────────
// Políticas
// ─────────────────────────────────────────────────────────────

export function parseWeekPolicy(name: string): WeekPolicy {
  const normalized = name.trim().toLowerCase();
  const found = WEEK_POLICIES.find((p) => p === normalized);
  if (!found) {
    throw new ValidationError(
      `Política de semana inválida: "${name}". Use: ${WEEK_POLICIES.join(", ")}`
    );
  }
  return found;
}

export function describePolicy(policy: WeekPolicy): string {
  return POLICY_DESCRIPTIONS[policy];
}

/**
 * Semana dentro do mês.
 * A semana 2 começa na primeira segunda-feira do mês; os dias antes dela
 * (semana parcial) são a semana 1. Se o dia 1 já é segunda, ele abre a semana 1.
 */
export function getWeekNumberMonthly(d: CalendarDate): number {
  const first = toCalendarDate(d.getUTCFullYear(), d.getUTCMonth() + 1, 1);

  let firstMonday = first;
  while (firstMonday.getUTCDay() !== 1) {
    const next = addDays(firstMonday, 1);
    if (next.getUTCMonth() !== first.getUTCMonth()) {
      firstMonday = first;
      break;
    }
    firstMonday = next;
  }

  if (d.getTime() < firstMonday.getTime()) return 1;

  const leadingPartialWeek = firstMonday.getTime() === first.getTime() ? 0 : 1;
  return Math.floor(diffDays(d, firstMonday) / 7) + 1 + leadingPartialWeek;
}

/** Semanas contínuas desde a âncora. Antes da âncora => 0 ("ainda não começou"). */
export function getWeekNumberProject(d: CalendarDate, anchor: CalendarDate): number {
  const days = diffDays(startOfUtcDay(d), startOfUtcDay(anchor));
  if (days < 0) return 0;
  return Math.floor(days / 7) + 1;
}

export function getIsoWeek(d: CalendarDate): { year: number; week: number } {
  const dayNum = d.getUTCDay() || 7; // domingo = 7
  // quinta-feira da mesma semana ISO decide o ano
  const thursday = addDays(d, 4 - dayNum);
  const yearStart = toCalendarDate(thursday.getUTCFullYear(), 1, 1);
  const week = Math.ceil((diffDays(thursday, yearStart) + 1) / 7);
  return { year: thursday.getUTCFullYear(), week };
}

export function computeWeekNumber(
  d: CalendarDate,
  policy: WeekPolicy,
  params: WeekPolicyParams
): number {
  switch (policy) {
    case "monthly":
      return getWeekNumberMonthly(d);
    case "iso":
      // bucket só pelo número da semana: W02/2025 e W02/2026 colidem
      return getIsoWeek(d).week;
    case "project":
      return getWeekNumberProject(d, params.anchor);
  }
}

/**
 * Intervalo [início, fim] de uma semana. Só existe na política "project"
 * e para semana >= 1; nas outras políticas retorna undefined.
 */
export function weekRange(
  week: number,
  policy: WeekPolicy,
  params: WeekPolicyParams
): WeekRange | undefined {
  if (policy !== "project" || week <= 0) return undefined;

  const start = addDays(startOfUtcDay(params.anchor), (week - 1) * 7);
  return { start, end: addDays(start, 6) };
}

/** Segunda-feira da semana (seg–dom) que contém a data. */
export function getMondayOfWeek(d: CalendarDate): CalendarDate {
  const sinceMonday = (d.getUTCDay() + 6) % 7;
  return addDays(startOfUtcDay(d), -sinceMonday);
}

/** Semana seg–dom que contém a data, independente de política. */
export function getWeekRange(d: CalendarDate): WeekRange {
  const start = getMondayOfWeek(d);
  return { start, end: addDays(start, 6) };
}

export function getCurrentProjectWeek(anchor: CalendarDate, now: CalendarDate = today()): number {
  return getWeekNumberProject(now, anchor);
}

// ─────────────────────────────────────────────────────────────
// Formatação (pt-BR)
// ─────────────────────────────────────────────────────────────

export function formatShortDate(d: CalendarDate): string {
  return `${d.getUTCDate()}/${d.getUTCMonth() + 1}`;
}

/** Ex.: "1/8 (sex)" */
export function formatDisplayDate(d: CalendarDate): string {
  return `${formatShortDate(d)} (${WEEKDAYS_PT[d.getUTCDay()]})`;
}

/** Ex.: "1/7 ~ 7/7" */
export function formatRange(range: WeekRange): string {
  return `${formatShortDate(range.start)} ~ ${formatShortDate(range.end)}`;
}
