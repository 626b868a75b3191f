import fs from "node:fs/promises";
import path from "node:path";

const isInside = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  return relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative);
};

/** Writes a file bundle below a fixed root directory; paths may not leave the root. */
export class WorkspaceService {
  constructor(private readonly root: string) {}

  resolveSafePath(relativePath: string): string {
    const cleaned = relativePath.replace(/^\/+/, "");
    const absolute = path.resolve(this.root, cleaned);
    if (!isInside(absolute, this.root)) {
      throw new Error(`Unsafe path rejected: ${relativePath}`);
    }
    return absolute;
  }

  async writeFiles(files: Readonly<Record<string, string>>): Promise<string[]> {
    const written: string[] = [];
    for (const [relativePath, content] of Object.entries(files)) {
      const absolute = this.resolveSafePath(relativePath);
      await fs.mkdir(path.dirname(absolute), { recursive: true });
      await fs.writeFile(absolute, content, "utf8");
      written.push(relativePath);
    }
    return written;
  }
}
