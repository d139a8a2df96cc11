import fs from "fs";
import path from "path";

/**
 * One bare-specifier alias per top-level directory in src, so modules
 * import each other as "utils/error" or "hashing" instead of deep
 * relative paths. tsconfig.json declares the same names under `paths`.
 */
export function src_aliases(root: string): Record<string, string> {
  const src = path.resolve(root, "src");
  return Object.fromEntries(
    fs
      .readdirSync(src, { withFileTypes: true })
      .filter((dirent) => dirent.isDirectory() && dirent.name !== "__tests__")
      .map((dirent) => [dirent.name, path.join(src, dirent.name)]),
  );
}
