import { readdir, readFile } from "fs/promises";
import { basename, extname, join } from "path";
import { InvalidCatalogError } from "./errors";
import { type MigrationUnit, defineMigration } from "./migration-unit";

/**
 * Split a migration file name into id and name.
 * `20251109193253_fix_security_issues.sql` gives id `20251109193253` and
 * name `fix_security_issues`; a stem without `_` is used for both.
 */
export function parseMigrationFileName(
  fileName: string,
): { id: string; name: string } {
  const stem = basename(fileName, extname(fileName));
  const separator = stem.indexOf("_");

  if (separator <= 0 || separator === stem.length - 1) {
    return { id: stem, name: stem };
  }

  return { id: stem.slice(0, separator), name: stem.slice(separator + 1) };
}

/**
 * Build a catalog from the `.sql` files of a directory, ordered by id
 * @throws InvalidCatalogError when two files share an id
 */
export async function loadSqlMigrations(
  directory: string,
): Promise<MigrationUnit[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && extname(entry.name) === ".sql")
    .map((entry) => entry.name);

  const units: MigrationUnit[] = [];
  const sources = new Map<string, string>();

  for (const file of files) {
    const { id, name } = parseMigrationFileName(file);
    const existing = sources.get(id);

    if (existing) {
      throw new InvalidCatalogError(
        `Migration id ${id} is used by both ${existing} and ${file}`,
      );
    }
    sources.set(id, file);

    const sql = await readFile(join(directory, file), "utf8");
    units.push(defineMigration({ id, name, forward: sql }));
  }

  return units.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}
