function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function isNotFound(err: unknown): boolean {
  return isErrnoException(err) && err.code === "ENOENT";
}
