import fs from "node:fs"
import path from "node:path"

export type ReadFileOptions = Readonly<{
  file: string
  required: boolean
  cwd?: string | undefined
}>

/**
 * Reads a UTF-8 file relative to `cwd`.
 *
 * @returns the content, or `undefined` when the file does not exist and is
 *   not required
 */
export function readOptionalFile({ file, required, cwd }: ReadFileOptions): string | undefined {
  const filePath = path.resolve(cwd ?? process.cwd(), file)

  try {
    return fs.readFileSync(filePath, "utf-8")
  } catch (err) {
    if (!required && isErrnoException(err) && err.code === "ENOENT") {
      return undefined
    }
    throw err
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}
