// 実行時エラー。いずれも状態を書き換える前に送出する

export class EmulationError extends Error {
  detail?: unknown;

  constructor(name: string, message: string, detail?: unknown) {
    super(message);
    this.name = name;
    this.detail = detail;
  }
}

export class InvalidRegisterIndex extends EmulationError {
  constructor(message: string, detail?: unknown) {
    super("InvalidRegisterIndex", message, detail);
  }
}

export class InvalidOperand extends EmulationError {
  constructor(message: string, detail?: unknown) {
    super("InvalidOperand", message, detail);
  }
}

export class UndefinedLabelError extends EmulationError {
  constructor(message: string, detail?: unknown) {
    super("UndefinedLabelError", message, detail);
  }
}

export class MemoryBoundsError extends EmulationError {
  constructor(message: string, detail?: unknown) {
    super("MemoryBoundsError", message, detail);
  }
}

export class InvalidPC extends EmulationError {
  constructor(message: string, detail?: unknown) {
    super("InvalidPC", message, detail);
  }
}
