import { basename, dirname, extname, join } from "node:path";

export const TEI_SUFFIX = ".tei.xml";

/**
 * `paper.pdf` → `paper.tei.xml`, in `outputDir` when one is given,
 * otherwise beside the source file.
 */
export function resolveTeiPath(filePath: string, outputDir?: string): string {
  const name = basename(filePath);
  const stem = name.slice(0, name.length - extname(name).length);
  return join(outputDir ?? dirname(filePath), stem + TEI_SUFFIX);
}
