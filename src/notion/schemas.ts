import { z } from "zod"

// permissive shapes for the parts of notion responses we read; anything
// else the api returns passes through untouched

export const richTextSchema = z
  .object({
    plain_text: z.string().optional(),
    text: z.object({ content: z.string() }).passthrough().optional(),
  })
  .passthrough()

export type RichText = z.infer<typeof richTextSchema>

export const propertySchema = z
  .object({
    date: z.object({ start: z.string() }).passthrough().nullish(),
    multi_select: z.array(z.object({ name: z.string() }).passthrough()).optional(),
    select: z.object({ name: z.string() }).passthrough().nullish(),
    title: z.array(richTextSchema).optional(),
    type: z.string(),
  })
  .passthrough()

export type PageProperty = z.infer<typeof propertySchema>

export const pageSchema = z
  .object({
    id: z.string(),
    properties: z.record(propertySchema).default({}),
    url: z.string().default(""),
  })
  .passthrough()

export type NotionPage = z.infer<typeof pageSchema>

export const blockObjectSchema = z
  .object({
    id: z.string().optional(),
    type: z.string(),
  })
  .passthrough()

export type NotionBlockObject = z.infer<typeof blockObjectSchema>

// the type-keyed payload inside a block object
export const blockPayloadSchema = z
  .object({
    checked: z.boolean().optional(),
    icon: z
      .object({ emoji: z.string().optional() })
      .passthrough()
      .nullish(),
    rich_text: z.array(richTextSchema).default([]),
  })
  .passthrough()

export const queryResultSchema = z
  .object({
    has_more: z.boolean().default(false),
    next_cursor: z.string().nullish(),
    results: z.array(pageSchema),
  })
  .passthrough()

export type QueryResult = z.infer<typeof queryResultSchema>

export const blockChildrenSchema = z
  .object({
    has_more: z.boolean().default(false),
    next_cursor: z.string().nullish(),
    results: z.array(blockObjectSchema),
  })
  .passthrough()

export const errorBodySchema = z
  .object({
    code: z.string().optional(),
    message: z.string(),
  })
  .passthrough()
