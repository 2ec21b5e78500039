/** Error hierarchy shared by the CLI, the daemon and the MCP server. */

export class ContactNotesError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ContactNotesError";
  }
}

export class ConfigError extends ContactNotesError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** A property or timestamp value that is not a valid date. */
export class ParseError extends ContactNotesError {
  readonly documentPath?: string;
  readonly property?: string;

  constructor(
    message: string,
    details: { documentPath?: string; property?: string } = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ParseError";
    this.documentPath = details.documentPath;
    this.property = details.property;
  }
}

export class MissingNameError extends ContactNotesError {
  readonly documentPath?: string;

  constructor(documentPath?: string) {
    super(`Contact document has no title: ${documentPath ?? "(unsaved document)"}`);
    this.name = "MissingNameError";
    this.documentPath = documentPath;
  }
}

export class ContactNotFoundError extends ContactNotesError {
  constructor(reference: string) {
    super(`No contact matches "${reference}"`);
    this.name = "ContactNotFoundError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
