export class ParseError extends Error {
  detail?: unknown;

  constructor(message: string, detail?: unknown) {
    super(message);
    this.name = "ParseError";
    this.detail = detail;
  }
}

export class IOError extends Error {
  detail?: unknown;

  constructor(message: string, detail?: unknown) {
    super(message);
    this.name = "IOError";
    this.detail = detail;
  }
}
