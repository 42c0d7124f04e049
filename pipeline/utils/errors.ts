/** A prerequisite artifact or setting is missing or invalid. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Writing a durable artifact failed; crawl progress may not be on disk. */
export class PersistenceError extends Error {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Failed to persist ${filePath}: ${toErrorMessage(options?.cause)}`, options);
    this.name = "PersistenceError";
    this.filePath = filePath;
  }
}

export const toErrorMessage = (value: unknown): string => {
  if (value instanceof Error && value.message.trim()) {
    return value.message.trim();
  }

  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }

  return "Unknown error";
};
