import { join } from "node:path";
import { readdirSync, statSync, type Dirent } from "node:fs";
import { InvalidRootError, errorMessage } from "../domain/errors.js";

export const PDF_EXTENSION = ".pdf";

export class DiscoverFilesUseCase {
  private readonly extension: string;

  constructor(
    extension: string = PDF_EXTENSION,
    /** Told about entries below the root that had to be skipped. */
    private onWarning: (message: string) => void = () => {},
  ) {
    this.extension = extension.toLowerCase();
  }

  /**
   * Checks the root right away, then returns a lazy walk of it.
   * Every call walks the filesystem again. Symlinked files are yielded,
   * symlinked directories are not followed.
   */
  execute(root: string): Iterable<string> {
    let isDirectory: boolean;
    try {
      isDirectory = statSync(root).isDirectory();
    } catch {
      throw new InvalidRootError(root, "does not exist");
    }
    if (!isDirectory) throw new InvalidRootError(root, "not a directory");

    return this.walkDir(root, true);
  }

  private *walkDir(dir: string, isRoot: boolean): Generator<string> {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (e) {
      if (isRoot) throw new InvalidRootError(dir, `cannot be read (${errorMessage(e)})`);
      this.onWarning(`Skipping unreadable directory ${dir}: ${errorMessage(e)}`);
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const res = join(dir, entry.name);
      if (entry.isDirectory()) {
        yield* this.walkDir(res, false);
      } else if (this.hasExtension(entry.name) && this.isRegularFile(entry, res)) {
        yield res;
      }
    }
  }

  private hasExtension(name: string): boolean {
    return name.toLowerCase().endsWith(this.extension);
  }

  private isRegularFile(entry: Dirent, path: string): boolean {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
      return statSync(path).isFile();
    } catch (e) {
      this.onWarning(`Skipping broken link ${path}: ${errorMessage(e)}`);
      return false;
    }
  }
}
