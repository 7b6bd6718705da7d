import type { ContentBlock } from "../types"

export const SUMMARY_ICON = "📝"
export const TOPICS_ICON = "🏷️"

export function heading(text: string, level: 1 | 2 | 3 = 2): ContentBlock {
  return { kind: "heading", level, text }
}

export function paragraph(text = ""): ContentBlock {
  return { kind: "paragraph", text }
}

export function bullet(text: string): ContentBlock {
  return { kind: "bullet", text }
}

export function todo(text: string, checked = false): ContentBlock {
  return { checked, kind: "todo", text }
}

export function callout(text: string, icon = "💡"): ContentBlock {
  return { icon, kind: "callout", text }
}

export function divider(): ContentBlock {
  return { kind: "divider" }
}
