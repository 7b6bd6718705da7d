import type { ContentBlock } from "../types"

/**
 * one display line per block, or null when the block renders to nothing
 */
export function renderBlock(block: ContentBlock): string | null {
  switch (block.kind) {
    case "heading":
      return `${"#".repeat(block.level)} ${block.text}`
    case "paragraph":
      return block.text ? block.text : null
    case "bullet":
      return `- ${block.text}`
    case "todo":
      return `${block.checked ? "[x]" : "[ ]"} ${block.text}`
    case "callout":
      return `> ${block.text}`
    case "divider":
      return "---"
  }
}

/**
 * order-preserving projection of a stored document back to text
 *
 * headings get a blank line before them; nothing is regrouped into sections.
 */
export function renderDocument(
  title: string,
  blocks: readonly ContentBlock[],
): string {
  const lines = [`# ${title}`, ""]

  for (const block of blocks) {
    const line = renderBlock(block)
    if (line === null) continue

    const previous = lines[lines.length - 1]
    if (block.kind === "heading" && previous !== "") {
      lines.push("")
    }
    lines.push(line)
  }

  return lines.join("\n").trimEnd()
}
