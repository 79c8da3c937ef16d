export class EmbeddingError extends Error {
  override readonly name = "EmbeddingError";
}

export class TaskDescriptorError extends Error {
  override readonly name = "TaskDescriptorError";

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export class DocumentLoadError extends Error {
  override readonly name = "DocumentLoadError";

  constructor(
    readonly documentId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
