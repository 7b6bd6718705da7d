// conversation archetype identifiers, as the host agent sends them
export type ArchetypeId =
  | "project_problem_solving"
  | "idea_brainstorming"
  | "learning_educational"
  | "general_discussion"

export type Confidence = "high" | "medium" | "low"

// one typed unit of document content, in visual order
export type ContentBlock =
  | { readonly kind: "heading"; readonly level: 1 | 2 | 3; readonly text: string }
  | { readonly kind: "paragraph"; readonly text: string }
  | { readonly kind: "bullet"; readonly text: string }
  | { readonly kind: "todo"; readonly text: string; readonly checked: boolean }
  | { readonly kind: "callout"; readonly text: string; readonly icon: string }
  | { readonly kind: "divider" }

// normalized analysis produced by the host agent for one conversation
export interface AnalysisRecord {
  title: string
  summary: string
  topics: string[]
  // one list per section key declared by the archetype
  sections: Record<string, string[]>
}

// where new documents go, chosen once at startup
export type Destination =
  | { kind: "freestanding"; containerId?: string }
  | { kind: "structured"; databaseId: string }

export interface DocumentRef {
  id: string
  url: string
}

// queryable attributes of a structured record
export interface RecordAttributes {
  type?: string
  date?: string
  topics?: string[]
  status?: string
  confidence?: Confidence
}

// read-only projection of a structured record returned by search
export interface SearchResult {
  id: string
  title: string
  type: string
  date: string
  topics: string
  status: string
  url: string
}

// a fetched document: title plus its ordered blocks
export interface StoredDocument {
  id: string
  title: string
  url: string
  blocks: ContentBlock[]
}
