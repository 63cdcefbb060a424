import { describe, it, expect } from "vitest";
import { BlockingMap } from "../domain/models/BlockingRecord";
import {
  dotComment,
  edge,
  node,
  renderBlockerGraph,
} from "../utils/dotRenderer";

describe("dotRenderer", () => {
  it("renders an empty graph", () => {
    expect(renderBlockerGraph(new Map())).toBe(
      ["digraph blockers {", "  layout=neato;", "  overlap=false;", '  sep="+1";', "}"].join("\n")
    );
  });

  it("marks root blockers as triangles and draws blocks edges", () => {
    const blocked: BlockingMap = new Map([
      ["A-1", { blocks: ["B-1", "B-2"], isBlockedBy: [] }],
      ["A-2", { blocks: ["B-1"], isBlockedBy: ["C-1"] }],
    ]);

    expect(renderBlockerGraph(blocked).split("\n")).toEqual([
      "digraph blockers {",
      "  layout=neato;",
      "  overlap=false;",
      '  sep="+1";',
      '  "A-1" [ shape = triangle ];',
      '  "B-1";',
      '  "A-1" -> "B-1";',
      '  "B-2";',
      '  "A-1" -> "B-2";',
      '  "B-1";',
      '  "A-2" -> "B-1";',
      "}",
    ]);
  });

  it("draws inward blockers only when asked", () => {
    const blocked: BlockingMap = new Map([
      ["A-2", { blocks: ["B-1"], isBlockedBy: ["C-1"] }],
    ]);

    expect(renderBlockerGraph(blocked)).not.toContain('"C-1"');
    expect(
      renderBlockerGraph(blocked, { inwardEdges: true }).split("\n")
    ).toContain('  "C-1" -> "A-2" [ style = dashed ];');
  });

  it("escapes quotes and backslashes in keys", () => {
    expect(node('A"1')).toBe('"A\\"1";');
    expect(edge("A\\1", "B")).toBe('"A\\\\1" -> "B";');
  });

  it("formats comments Graphviz ignores", () => {
    expect(dotComment("Found 3 matching issues.")).toBe(
      "# Found 3 matching issues."
    );
  });
});
