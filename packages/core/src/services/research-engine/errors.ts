/**
 * Research engine errors
 *
 * Fatal failures surface as one ResearchError naming the stage that
 * failed. Cancellation is its own class so callers can tell a user abort
 * from a broken run.
 */

/**
 * Pipeline stages that can fail a whole run
 */
export type ResearchStage = "planning" | "search" | "fetch" | "synthesis";

export class ResearchError extends Error {
  readonly stage: ResearchStage;

  constructor(stage: ResearchStage, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResearchError";
    this.stage = stage;
  }
}

export class ResearchCancelledError extends Error {
  constructor(reason?: unknown) {
    super(
      reason instanceof Error
        ? `Research cancelled: ${reason.message}`
        : "Research cancelled",
      { cause: reason }
    );
    this.name = "ResearchCancelledError";
  }
}

/**
 * A synthesized finding cites a source index the brief does not have
 */
export class CitationError extends Error {
  readonly findingTopic: string;
  readonly citation: number;
  readonly sourceCount: number;

  constructor(findingTopic: string, citation: number, sourceCount: number) {
    super(
      `Finding "${findingTopic}" cites source index ${citation}, but the brief has ${sourceCount} sources`
    );
    this.name = "CitationError";
    this.findingTopic = findingTopic;
    this.citation = citation;
    this.sourceCount = sourceCount;
  }
}

export type FetchErrorKind =
  | "http"
  | "timeout"
  | "blocked"
  | "empty"
  | "unsupported"
  | "network";

/**
 * A single URL could not be turned into an article
 */
export class FetchError extends Error {
  readonly url: string;
  readonly kind: FetchErrorKind;
  readonly status?: number;

  constructor(
    url: string,
    kind: FetchErrorKind,
    message: string,
    options?: ErrorOptions & { status?: number }
  ) {
    super(`Failed to fetch ${url}: ${message}`, options);
    this.name = "FetchError";
    this.url = url;
    this.kind = kind;
    this.status = options?.status;
  }

  /**
   * Whether another attempt could succeed
   */
  get retryable(): boolean {
    if (this.kind === "network") return true;
    if (this.kind !== "http" || this.status === undefined) return false;
    return this.status === 429 || this.status >= 500;
  }
}
