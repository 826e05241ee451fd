// src/domain/notion.ts

import type { WeekAssignment } from "./week.js";

// ═══════════════════════════════════════════════════════════
// PROPRIEDADES DE PÁGINA
// ═══════════════════════════════════════════════════════════

export interface RichText {
  plain_text: string;
}

export type NotionProperty =
  | { type: "title"; title: RichText[] }
  | { type: "rich_text"; rich_text: RichText[] }
  | { type: "select"; select: { name: string } | null }
  | { type: "multi_select"; multi_select: { name: string }[] }
  | { type: "date"; date: { start: string; end?: string | null } | null }
  | { type: "number"; number: number | null }
  | { type: "checkbox"; checkbox: boolean }
  | { type: "url"; url: string | null }
  | { type: "email"; email: string | null }
  | { type: "phone_number"; phone_number: string | null }
  // Tipos que o digest não interpreta (formula, relation, people...)
  | { type: "unsupported"; rawType: string };

// ═══════════════════════════════════════════════════════════
// DOCUMENTO (página de database)
// ═══════════════════════════════════════════════════════════

export interface NotionDocument {
  id: string;
  createdTime: string;
  lastEditedTime?: string;
  url: string;
  properties: Record<string, NotionProperty>;

  // start da primeira propriedade "date" preenchida
  date: string | null;

  // preenchido só pelo WeeklyAggregator.classify()
  _week?: WeekAssignment;
}

export interface NotionDatabase {
  id: string;
  title: string | null;
  createdTime: string;
  url: string;
  propertyTypes: Record<string, string>;
}

// ═══════════════════════════════════════════════════════════
// BLOCOS
// ═══════════════════════════════════════════════════════════

export type HeadingType = "heading_1" | "heading_2" | "heading_3";

interface BlockBase {
  id: string;
  hasChildren: boolean;
  children: Block[];
}

export type Block =
  | (BlockBase & { type: HeadingType; text: string })
  | (BlockBase & { type: "paragraph"; text: string })
  | (BlockBase & { type: "to_do"; text: string; checked: boolean })
  | (BlockBase & { type: "bulleted_list_item"; text: string })
  | (BlockBase & { type: "numbered_list_item"; text: string })
  | (BlockBase & { type: "code"; text: string; language: string })
  | (BlockBase & { type: "quote"; text: string })
  | (BlockBase & { type: "divider" })
  | (BlockBase & { type: "unknown"; rawType: string; payload: unknown });

// ═══════════════════════════════════════════════════════════
// CONTENT STORE (fonte paginada)
// ═══════════════════════════════════════════════════════════

export interface Page<T> {
  items: T[];
  nextCursor: string | null;
  hasMore: boolean;
}

export interface ContentStore {
  /** Filhos diretos de um bloco/página (uma página de resultados). */
  fetchChildPage(parentId: string, cursor?: string): Promise<Page<Block>>;

  /** Listagem plana de uma database (uma página de resultados). */
  fetchCollectionPage(collectionId: string, cursor?: string): Promise<Page<NotionDocument>>;
}
