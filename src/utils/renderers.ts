// src/utils/renderers.ts
//
// Helpers de renderização (somente formatação), sem IO.
// - Block -> texto simples (markdown-ish) para leitura no terminal
// - Propriedades de página -> string

import type { Block, HeadingType, NotionDocument, NotionProperty } from "../domain/notion.js";
import { plainText } from "../notion/mappers.js";
import { TextPayloadSchema } from "../notion/schemas.js";

const HEADING_PREFIXES: Record<HeadingType, string> = {
  heading_1: "# ",
  heading_2: "## ",
  heading_3: "### ",
};

export const UNTITLED = "Sem título";

export function blockToText(block: Block): string {
  switch (block.type) {
    case "heading_1":
    case "heading_2":
    case "heading_3":
      return HEADING_PREFIXES[block.type] + block.text;
    case "to_do":
      return `[${block.checked ? "x" : " "}] ${block.text}`;
    case "bulleted_list_item":
      return `- ${block.text}`;
    case "numbered_list_item":
      return `1. ${block.text}`;
    case "code":
      return "```" + block.language + "\n" + block.text + "\n```";
    case "quote":
      return `> ${block.text}`;
    case "divider":
      return "---";
    case "paragraph":
      return block.text;
    case "unknown": {
      // toggle, callout etc.: sem formatação própria, mas o texto aparece
      const text = TextPayloadSchema.safeParse(block.payload);
      return text.success ? plainText(text.data.rich_text) : "";
    }
  }
}

/** Renderiza a árvore; filhos ganham +2 espaços de indentação, linhas vazias somem. */
export function renderBlocks(blocks: Block[], indent = 0): string {
  const lines: string[] = [];

  for (const block of blocks) {
    const line = blockToText(block);
    if (line.trim()) lines.push(" ".repeat(indent) + line);

    if (block.children.length > 0) {
      const childContent = renderBlocks(block.children, indent + 2);
      if (childContent) lines.push(childContent);
    }
  }

  return lines.join("\n");
}

export function formatPropertyValue(prop: NotionProperty): string {
  switch (prop.type) {
    case "title":
      return plainText(prop.title);
    case "rich_text":
      return plainText(prop.rich_text);
    case "select":
      return prop.select?.name ?? "";
    case "multi_select":
      return prop.multi_select.map((o) => o.name).join(", ");
    case "date":
      if (!prop.date) return "";
      return prop.date.end ? `${prop.date.start} ~ ${prop.date.end}` : prop.date.start;
    case "number":
      return prop.number === null ? "" : String(prop.number);
    case "checkbox":
      return prop.checkbox ? "✓" : "✗";
    case "url":
      return prop.url ?? "";
    case "email":
      return prop.email ?? "";
    case "phone_number":
      return prop.phone_number ?? "";
    case "unsupported":
      return "";
  }
}

export function getPageTitle(doc: NotionDocument): string {
  const titleProp = Object.values(doc.properties).find((p) => p.type === "title");
  const title = titleProp ? formatPropertyValue(titleProp) : "";
  return title || UNTITLED;
}

/** Propriedades legíveis; a propriedade de título aparece como "Título". */
export function formatPageProperties(doc: NotionDocument): Record<string, string> {
  const formatted: Record<string, string> = {};

  for (const [name, prop] of Object.entries(doc.properties)) {
    const value = formatPropertyValue(prop);
    if (!value) continue;
    formatted[prop.type === "title" ? "Título" : name] = value;
  }

  return formatted;
}
