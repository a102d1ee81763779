export type ErrorKind =
  | "read"
  | "date"
  | "template"
  | "render"
  | "feed"
  | "watch"
  | "serve"
  | "command"
  | "usage";

export class BuildError extends Error {
  declare kind: ErrorKind;
  declare path: string | undefined;
  constructor(kind: ErrorKind, message: string, path?: string, cause?: unknown) {
    super(message, { cause });
    this.name = "BuildError";
    this.kind = kind;
    this.path = path;
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
