export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return isErrnoException(err) && err.code === code;
}
