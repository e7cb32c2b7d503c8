import { mkdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";

export async function writeAtomic(targetPath: string, content: string): Promise<void> {
  await mkdir(path.dirname(targetPath), { recursive: true });

  const tempPath = `${targetPath}.tmp`;
  await writeFile(tempPath, content, "utf8");
  await rename(tempPath, targetPath);
}
