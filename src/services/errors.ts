export class SequenceError extends Error {
  constructor(
    message: string,
    public expected: number,
    public actual: number
  ) {
    super(message);
    this.name = "SequenceError";
    // TypeScript→ES5/ES2016トランスパイル後のinstanceof問題を回避
    Object.setPrototypeOf(this, SequenceError.prototype);
  }
}

export class StructuralMismatchError extends Error {
  constructor(
    message: string,
    public entryCount: number,
    public recordCount: number
  ) {
    super(message);
    this.name = "StructuralMismatchError";
    // TypeScript→ES5/ES2016トランスパイル後のinstanceof問題を回避
    Object.setPrototypeOf(this, StructuralMismatchError.prototype);
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
    // TypeScript→ES5/ES2016トランスパイル後のinstanceof問題を回避
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
