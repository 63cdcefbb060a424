import { BlockingMap } from "../domain/models/BlockingRecord";

export interface RenderOptions {
  /** Also draw "is blocked by" relations as dashed edges */
  inwardEdges?: boolean;
}

const HEADER = [
  "digraph blockers {",
  "  layout=neato;",
  "  overlap=false;",
  '  sep="+1";',
];

function quote(key: string): string {
  return `"${key.replace(/[\\"]/g, "\\$&")}"`;
}

/** Format a vertex, as a triangle when it is a root blocker */
export function node(key: string, special = false): string {
  return special ? `${quote(key)} [ shape = triangle ];` : `${quote(key)};`;
}

export function edge(from: string, to: string, style?: string): string {
  const attrs = style ? ` [ style = ${style} ]` : "";
  return `${quote(from)} -> ${quote(to)}${attrs};`;
}

/** Graphviz skips lines starting with '#' */
export function dotComment(text: string): string {
  return `# ${text}`;
}

export function renderBlockerGraph(
  blocked: BlockingMap,
  opts: RenderOptions = {}
): string {
  const lines = [...HEADER];
  const indent = (line: string) => lines.push(`  ${line}`);

  for (const [key, record] of blocked) {
    if (record.isBlockedBy.length === 0) indent(node(key, true));
    for (const target of record.blocks) {
      indent(node(target));
      indent(edge(key, target));
    }
    if (opts.inwardEdges) {
      for (const source of record.isBlockedBy) {
        indent(edge(source, key, "dashed"));
      }
    }
  }

  lines.push("}");
  return lines.join("\n");
}
