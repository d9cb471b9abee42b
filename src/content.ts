/**
 * Content loader — resolves an agent name to its entry and reads the full
 * file only when asked.
 */

import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve, sep } from "node:path";
import type { AgentEntry } from "./types";
import { RegistryError, errnoCode, errorMessage } from "./errors";
import { compareNames } from "./terms";

/**
 * Exact case-insensitive name first, then substring. More than one
 * substring hit is Ambiguous; the loader never guesses.
 */
export function resolveEntry(entries: readonly AgentEntry[], name: string): AgentEntry {
  const needle = name.trim().toLowerCase();
  if (!needle) {
    throw new RegistryError("NotFound", "No agent name given");
  }

  const exact = entries.find((e) => e.name.toLowerCase() === needle);
  if (exact) return exact;

  const partial = entries.filter((e) => e.name.toLowerCase().includes(needle));
  if (partial.length === 1) return partial[0];

  if (partial.length > 1) {
    const candidates = partial.map((e) => e.name).sort(compareNames);
    throw new RegistryError("Ambiguous", `"${name}" matches ${candidates.length} agents`, {
      candidates,
      hint: "Use one of the full names listed above.",
    });
  }

  throw new RegistryError("NotFound", `No agent named "${name}"`, {
    hint: "Run `agent-registry list` to see indexed agents.",
  });
}

/** Absolute location of an entry's file; refuses paths that leave the root. */
export function contentPath(root: string, entry: AgentEntry): string {
  const absRoot = resolve(root);
  const target = resolve(absRoot, entry.path);
  const rel = relative(absRoot, target);
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new RegistryError("CorruptIndex", `Entry "${entry.name}" points outside the content root: ${entry.path}`, {
      hint: "Run `agent-registry rebuild` to regenerate the index.",
    });
  }
  return target;
}

export async function loadContent(root: string, entry: AgentEntry): Promise<string> {
  const filePath = contentPath(root, entry);
  try {
    return await readFile(filePath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new RegistryError("MissingContent", `Agent "${entry.name}" is indexed but ${entry.path} no longer exists`, {
        hint: "The index is stale. Run `agent-registry rebuild`.",
        cause: err,
      });
    }
    throw new RegistryError("IOFailure", `Could not read ${entry.path}: ${errorMessage(err)}`, { cause: err });
  }
}
