export type LineHistoryErrorCode =
  | "repository_not_found"
  | "repository_empty"
  | "file_not_found"
  | "invalid_date_format"
  | "invalid_line_number"
  | "backend_io";

export class LineHistoryError extends Error {
  readonly code: LineHistoryErrorCode;

  constructor(code: LineHistoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LineHistoryError";
    this.code = code;
  }
}

export class RepositoryNotFoundError extends LineHistoryError {
  readonly repositoryPath: string;

  constructor(repositoryPath: string, options?: { cause?: unknown }) {
    super("repository_not_found", `Not a git repository: ${repositoryPath}`, options);
    this.name = "RepositoryNotFoundError";
    this.repositoryPath = repositoryPath;
  }
}

export class RepositoryEmptyError extends LineHistoryError {
  constructor(options?: { cause?: unknown }) {
    super("repository_empty", "Repository has no commits reachable from HEAD", options);
    this.name = "RepositoryEmptyError";
  }
}

export class FileNotFoundError extends LineHistoryError {
  readonly filePath: string;

  constructor(filePath: string) {
    super("file_not_found", `File not found in repository: ${filePath}`);
    this.name = "FileNotFoundError";
    this.filePath = filePath;
  }
}

export class InvalidDateFormatError extends LineHistoryError {
  readonly input: string;

  constructor(input: string, supportedFormats: readonly string[]) {
    super(
      "invalid_date_format",
      `Unable to parse date '${input}'. Supported formats: ${supportedFormats.join(", ")}`,
    );
    this.name = "InvalidDateFormatError";
    this.input = input;
  }
}

export class InvalidLineNumberError extends LineHistoryError {
  readonly lineNumber: number;

  constructor(lineNumber: number) {
    super("invalid_line_number", `Line number must be a positive integer, got ${lineNumber}`);
    this.name = "InvalidLineNumberError";
    this.lineNumber = lineNumber;
  }
}

export class BackendIoError extends LineHistoryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("backend_io", message, options);
    this.name = "BackendIoError";
  }
}
