import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

function temporaryPath(file: string): string {
  return path.join(
    path.dirname(file),
    `.${path.basename(file)}.${randomUUID()}.tmp`,
  );
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Write a whole file or nothing
 *
 * Content goes to a temporary sibling first, which then takes the final name.
 * With `exclusive`, an existing file is never replaced and EEXIST is raised.
 */
export async function writeFileAtomic(
  file: string,
  content: string | Uint8Array,
  { exclusive = false }: { exclusive?: boolean } = {},
): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });

  const temporary = temporaryPath(file);
  try {
    await fs.writeFile(temporary, content);
    if (exclusive) await fs.link(temporary, file);
    else await fs.rename(temporary, file);
  } finally {
    await fs.rm(temporary, { force: true });
  }
}
