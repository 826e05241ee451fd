// src/notion/schemas.ts
//
// Schemas zod das respostas da Notion API (só os campos que o digest usa).
// O Notion devolve objetos bem flexíveis, então tudo é .passthrough():
// campos extras passam, campos obrigatórios faltando => erro de protocolo.

import { z } from "zod";

export const RichTextSchema = z
  .object({
    plain_text: z.string().default(""),
  })
  .passthrough();

export const ListResponseSchema = z.object({
  results: z.array(z.unknown()),
  next_cursor: z.string().nullable().optional(),
  has_more: z.boolean(),
});

export const RawBlockSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    has_children: z.boolean().default(false),
  })
  .passthrough();

// payload comum dos blocos de texto: { rich_text: [...], checked?, language? }
export const TextPayloadSchema = z
  .object({
    rich_text: z.array(RichTextSchema).default([]),
    checked: z.boolean().optional(),
    language: z.string().optional(),
  })
  .passthrough();

export const RawPropertySchema = z
  .object({
    type: z.string(),
  })
  .passthrough();

export const RawPageSchema = z
  .object({
    id: z.string(),
    created_time: z.string(),
    last_edited_time: z.string().optional(),
    url: z.string(),
    properties: z.record(RawPropertySchema).default({}),
  })
  .passthrough();

export const RawDatabaseSchema = z
  .object({
    id: z.string(),
    created_time: z.string(),
    url: z.string(),
    title: z.array(RichTextSchema).default([]),
    properties: z.record(RawPropertySchema).default({}),
  })
  .passthrough();

export const ErrorBodySchema = z.object({
  message: z.string(),
});

// ─────────────────────────────────────────────────────────────
// Propriedades tipadas
// ─────────────────────────────────────────────────────────────

const NamedOptionSchema = z.object({ name: z.string() }).passthrough();

export const PropertySchemas = {
  title: z.object({ title: z.array(RichTextSchema).default([]) }),
  rich_text: z.object({ rich_text: z.array(RichTextSchema).default([]) }),
  select: z.object({ select: NamedOptionSchema.nullable().default(null) }),
  multi_select: z.object({ multi_select: z.array(NamedOptionSchema).default([]) }),
  date: z.object({
    date: z
      .object({ start: z.string(), end: z.string().nullable().optional() })
      .nullable()
      .default(null),
  }),
  number: z.object({ number: z.number().nullable().default(null) }),
  checkbox: z.object({ checkbox: z.boolean().default(false) }),
  url: z.object({ url: z.string().nullable().default(null) }),
  email: z.object({ email: z.string().nullable().default(null) }),
  phone_number: z.object({ phone_number: z.string().nullable().default(null) }),
};
