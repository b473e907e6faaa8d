/** 電文の開始・終了やチェックサムが不正 */
export class MalformedTelegramError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedTelegramError";
  }
}

export class ChecksumMismatchError extends MalformedTelegramError {
  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Checksum mismatch: expected=${expected} actual=${actual}`);
    this.name = "ChecksumMismatchError";
  }
}

/** 対象のOBISコードの値を解釈できない (その行のみ破棄する) */
export class DecodeError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly line: string,
  ) {
    super(`${message}: ${line}`);
    this.name = "DecodeError";
  }
}
