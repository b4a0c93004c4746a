import { promises as fs } from "node:fs";
import { dirname } from "node:path";

export async function writeRecapFile(
  path: string,
  content: string
): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, content, "utf8");
  console.log(`\nOutput written to ${path}`);
}
