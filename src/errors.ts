import type { ZodError } from "zod"

/**
 * base class for every error the distiller reports back to the host
 */
export class DistillerError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * malformed tool input or an unknown conversation type on a write path
 */
export class ValidationError extends DistillerError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(message)
    this.issues = issues
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    return new ValidationError(message, issues)
  }
}

export type ConfigurationReason =
  | "missing-credential"
  | "missing-destination"
  | "missing-database"

const REMEDIATION: Record<ConfigurationReason, string[]> = {
  "missing-credential": [
    "Create an integration at https://www.notion.so/my-integrations",
    "Set NOTION_API_KEY in your .env file (or notion.apiKey in distiller.config.json)",
    "Restart the server",
  ],
  "missing-database": [
    "Create a database with Title, Type, Date, Topics, Status and Confidence properties",
    "Share it with your integration",
    "Copy the database id from its URL into NOTION_DATABASE_ID",
  ],
  "missing-destination": [
    "Create a page in Notion (e.g. 'Claude Notes') or a notes database",
    "Share it with your integration",
    "Copy its id from the URL into NOTION_PARENT_PAGE_ID or NOTION_DATABASE_ID",
  ],
}

const SUMMARY: Record<ConfigurationReason, string> = {
  "missing-credential": "Notion API key not configured.",
  "missing-database": "Notion database ID not configured.",
  "missing-destination":
    "No Notion destination configured (parent page or database).",
}

/**
 * a required credential or destination id is absent
 */
export class ConfigurationError extends DistillerError {
  readonly reason: ConfigurationReason
  readonly remediation: string[]

  constructor(reason: ConfigurationReason) {
    super(SUMMARY[reason])
    this.reason = reason
    this.remediation = REMEDIATION[reason]
  }
}

/**
 * non-success response from the notion api
 */
export class RemoteError extends DistillerError {
  readonly statusCode: number

  constructor(statusCode: number, message: string) {
    super(message)
    this.statusCode = statusCode
  }
}

/**
 * the configured backend cannot perform the requested operation
 */
export class UnsupportedOperationError extends DistillerError {
  readonly operation: string

  constructor(operation: string, reason: string) {
    super(`${operation} is not supported: ${reason}`)
    this.operation = operation
  }
}

/**
 * render any thrown value as the text returned to the host
 */
export function formatToolError(error: unknown, context?: string): string {
  const prefix = context ? `❌ Error ${context}` : "❌ Error"

  if (error instanceof ValidationError) {
    const details = error.issues.map((issue) => `- ${issue}`).join("\n")
    return details
      ? `${prefix}: ${error.message}\n\n${details}`
      : `${prefix}: ${error.message}`
  }

  if (error instanceof ConfigurationError) {
    const steps = error.remediation
      .map((step, index) => `${index + 1}. ${step}`)
      .join("\n")
    return `${prefix}: ${error.message}\n\nTo fix this:\n${steps}`
  }

  if (error instanceof RemoteError) {
    return `${prefix}: Notion API returned ${error.statusCode} - ${error.message}`
  }

  if (error instanceof UnsupportedOperationError) {
    return `${prefix}: ${error.message}`
  }

  const message = error instanceof Error ? error.message : String(error)
  return `${prefix}: ${message}`
}
