// src/notion/mappers.ts
//
// JSON cru do Notion -> tipos de domínio (Block, NotionDocument, NotionDatabase).
// Lança ZodError se o shape mínimo não bater; o NotionClient converte em TransportError.

import type { Block, NotionDatabase, NotionDocument, NotionProperty, RichText } from "../domain/notion.js";
import {
  PropertySchemas,
  RawBlockSchema,
  RawDatabaseSchema,
  RawPageSchema,
  TextPayloadSchema,
} from "./schemas.js";

export function plainText(richText: RichText[]): string {
  return richText.map((r) => r.plain_text).join("");
}

// ─────────────────────────────────────────────────────────────
// Blocos
// ─────────────────────────────────────────────────────────────

export function toBlock(raw: unknown): Block {
  const parsed = RawBlockSchema.parse(raw);
  const base = { id: parsed.id, hasChildren: parsed.has_children, children: [] };
  const type = parsed.type;
  const payload: unknown = parsed[type];

  const unknownBlock: Block = { ...base, type: "unknown", rawType: type, payload };

  if (type === "divider") return { ...base, type: "divider" };

  const text = TextPayloadSchema.safeParse(payload ?? {});
  if (!text.success) return unknownBlock;

  const content = plainText(text.data.rich_text);

  switch (type) {
    case "heading_1":
    case "heading_2":
    case "heading_3":
      return { ...base, type, text: content };
    case "paragraph":
      return { ...base, type: "paragraph", text: content };
    case "to_do":
      return { ...base, type: "to_do", text: content, checked: text.data.checked ?? false };
    case "bulleted_list_item":
      return { ...base, type: "bulleted_list_item", text: content };
    case "numbered_list_item":
      return { ...base, type: "numbered_list_item", text: content };
    case "code":
      return { ...base, type: "code", text: content, language: text.data.language ?? "" };
    case "quote":
      return { ...base, type: "quote", text: content };
    default:
      return unknownBlock;
  }
}

// ─────────────────────────────────────────────────────────────
// Propriedades / páginas
// ─────────────────────────────────────────────────────────────

export function toProperty(raw: { type: string; [k: string]: unknown }): NotionProperty {
  const unsupported: NotionProperty = { type: "unsupported", rawType: raw.type };

  switch (raw.type) {
    case "title": {
      const r = PropertySchemas.title.safeParse(raw);
      return r.success ? { type: "title", title: r.data.title } : unsupported;
    }
    case "rich_text": {
      const r = PropertySchemas.rich_text.safeParse(raw);
      return r.success ? { type: "rich_text", rich_text: r.data.rich_text } : unsupported;
    }
    case "select": {
      const r = PropertySchemas.select.safeParse(raw);
      return r.success ? { type: "select", select: r.data.select } : unsupported;
    }
    case "multi_select": {
      const r = PropertySchemas.multi_select.safeParse(raw);
      return r.success ? { type: "multi_select", multi_select: r.data.multi_select } : unsupported;
    }
    case "date": {
      const r = PropertySchemas.date.safeParse(raw);
      return r.success ? { type: "date", date: r.data.date } : unsupported;
    }
    case "number": {
      const r = PropertySchemas.number.safeParse(raw);
      return r.success ? { type: "number", number: r.data.number } : unsupported;
    }
    case "checkbox": {
      const r = PropertySchemas.checkbox.safeParse(raw);
      return r.success ? { type: "checkbox", checkbox: r.data.checkbox } : unsupported;
    }
    case "url": {
      const r = PropertySchemas.url.safeParse(raw);
      return r.success ? { type: "url", url: r.data.url } : unsupported;
    }
    case "email": {
      const r = PropertySchemas.email.safeParse(raw);
      return r.success ? { type: "email", email: r.data.email } : unsupported;
    }
    case "phone_number": {
      const r = PropertySchemas.phone_number.safeParse(raw);
      return r.success ? { type: "phone_number", phone_number: r.data.phone_number } : unsupported;
    }
    default:
      return unsupported;
  }
}

/** start da primeira propriedade "date" preenchida (ordem do Notion). */
export function extractDocumentDate(properties: Record<string, NotionProperty>): string | null {
  for (const prop of Object.values(properties)) {
    if (prop.type === "date" && prop.date) return prop.date.start;
  }
  return null;
}

export function toDocument(raw: unknown): NotionDocument {
  const page = RawPageSchema.parse(raw);

  const properties: Record<string, NotionProperty> = {};
  for (const [name, prop] of Object.entries(page.properties)) {
    properties[name] = toProperty(prop);
  }

  return {
    id: page.id,
    createdTime: page.created_time,
    lastEditedTime: page.last_edited_time,
    url: page.url,
    properties,
    date: extractDocumentDate(properties),
  };
}

export function toDatabase(raw: unknown): NotionDatabase {
  const db = RawDatabaseSchema.parse(raw);
  const title = plainText(db.title).trim();

  return {
    id: db.id,
    title: title || null,
    createdTime: db.created_time,
    url: db.url,
    propertyTypes: Object.fromEntries(
      Object.entries(db.properties).map(([name, prop]) => [name, prop.type])
    ),
  };
}
