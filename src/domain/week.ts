// src/domain/week.ts

// ═══════════════════════════════════════════════════════
// Políticas de numeração de semana
// ═══════════════════════════════════════════════════════

export const WEEK_POLICIES = ["project", "monthly", "iso"] as const;

export type WeekPolicy = (typeof WEEK_POLICIES)[number];

/**
 * Data de calendário sem hora, sempre em UTC meia-noite.
 * Evita que o fuso da máquina mude o dia da semana.
 */
export type CalendarDate = Date;

export interface WeekPolicyParams {
  /** Início da semana 1 na política "project". */
  anchor: CalendarDate;
}

export interface WeekRange {
  start: CalendarDate;
  end: CalendarDate;
}

// ═══════════════════════════════════════════════════════
// Resultado da classificação
// ═══════════════════════════════════════════════════════

export interface WeekAssignment {
  policy: WeekPolicy;
  weekNumber: number;
  originalDate: string;
  displayDate: string;
  range?: WeekRange;
  // Só na política ISO: o bucket ignora o ano, mas guardamos aqui
  isoYear?: number;
}

export interface WeekBucket<T> {
  week: number;
  documents: T[];
  range?: WeekRange;
}

export interface WeekPreviewItem {
  title: string;
  displayDate: string;
}

export interface WeekPreview {
  week: number;
  count: number;
  range?: WeekRange;
  items: WeekPreviewItem[];
  moreCount: number;
}
