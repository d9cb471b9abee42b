/**
 * Tests for name resolution, lazy content loading and the error taxonomy.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { contentPath, loadContent, resolveEntry } from "../src/content";
import { RegistryError, errnoCode, isRegistryError } from "../src/errors";
import { createAgentRoot, makeEntry } from "./fixtures/helpers";
import type { AgentRoot } from "./fixtures/helpers";
import { REACT_EXPERT } from "./fixtures/sample-agents";

const entries = [
  makeEntry({ name: "react-expert" }),
  makeEntry({ name: "react-native-expert" }),
  makeEntry({ name: "go-expert" }),
  makeEntry({ name: "python-tester" }),
];

function caught(fn: () => unknown): RegistryError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RegistryError) return err;
    throw err;
  }
  throw new Error("expected a RegistryError");
}

describe("resolveEntry", () => {
  test("exact name wins even when it is also a substring of others", () => {
    expect(resolveEntry(entries, "react-expert").name).toBe("react-expert");
  });

  test("exact match ignores case and surrounding whitespace", () => {
    expect(resolveEntry(entries, "  Go-Expert ").name).toBe("go-expert");
  });

  test("a unique partial match resolves", () => {
    expect(resolveEntry(entries, "native").name).toBe("react-native-expert");
    expect(resolveEntry(entries, "python").name).toBe("python-tester");
  });

  test("several partial matches are Ambiguous with sorted candidates", () => {
    const err = caught(() => resolveEntry(entries, "react"));
    expect(err.kind).toBe("Ambiguous");
    expect(err.exitCode).toBe(2);
    expect(err.candidates).toEqual(["react-expert", "react-native-expert"]);
  });

  test("no match is NotFound", () => {
    const err = caught(() => resolveEntry(entries, "rust"));
    expect(err.kind).toBe("NotFound");
    expect(err.message).toBe('No agent named "rust"');
  });

  test("blank name is NotFound", () => {
    expect(caught(() => resolveEntry(entries, "   ")).kind).toBe("NotFound");
  });
});

describe("contentPath", () => {
  test("resolves inside the root", () => {
    expect(contentPath("/srv/reg", makeEntry({ path: "agents/a.md" }))).toBe("/srv/reg/agents/a.md");
  });

  test("refuses paths that climb out of the root", () => {
    const err = caught(() => contentPath("/srv/reg", makeEntry({ name: "evil", path: "../outside.md" })));
    expect(err.kind).toBe("CorruptIndex");
    expect(err.message).toBe('Entry "evil" points outside the content root: ../outside.md');
  });

  test("a sibling directory sharing the prefix is still outside", () => {
    expect(caught(() => contentPath("/srv/reg", makeEntry({ path: "../reg-other/a.md" }))).kind).toBe("CorruptIndex");
  });
});

describe("loadContent", () => {
  let agentRoot: AgentRoot;

  beforeEach(async () => {
    agentRoot = await createAgentRoot({ "agents/react-expert.md": REACT_EXPERT });
  });

  afterEach(async () => {
    await agentRoot.cleanup();
  });

  test("returns the file verbatim", async () => {
    const content = await loadContent(agentRoot.root, makeEntry({ name: "react-expert" }));
    expect(content).toBe(REACT_EXPERT);
  });

  test("missing file is MissingContent", async () => {
    const entry = makeEntry({ name: "ghost" });
    await expect(loadContent(agentRoot.root, entry)).rejects.toMatchObject({
      kind: "MissingContent",
      exitCode: 3,
      message: 'Agent "ghost" is indexed but agents/ghost.md no longer exists',
    });
  });

  test("unreadable path is IOFailure", async () => {
    // A directory where a file is expected
    const entry = makeEntry({ name: "dir", path: "agents" });
    await expect(loadContent(agentRoot.root, entry)).rejects.toMatchObject({ kind: "IOFailure", exitCode: 5 });
  });
});

describe("RegistryError", () => {
  test("format lists candidates and the hint", () => {
    const err = new RegistryError("Ambiguous", '"react" matches 2 agents', {
      candidates: ["react-expert", "react-native-expert"],
      hint: "Use one of the full names listed above.",
    });
    expect(err.format()).toBe(
      [
        'Ambiguous: "react" matches 2 agents',
        "Candidates:",
        "  - react-expert",
        "  - react-native-expert",
        "Hint: Use one of the full names listed above.",
      ].join("\n")
    );
  });

  test("toJSON omits empty optional fields", () => {
    expect(new RegistryError("IOFailure", "disk full").toJSON()).toEqual({
      error: { kind: "IOFailure", message: "disk full", exitCode: 5 },
    });
  });

  test("type guard and errno helper", () => {
    expect(isRegistryError(new RegistryError("NotFound", "x"))).toBe(true);
    expect(isRegistryError(new Error("x"))).toBe(false);
    expect(errnoCode(Object.assign(new Error("gone"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(errnoCode("ENOENT")).toBeUndefined();
  });
});
