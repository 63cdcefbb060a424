import { Issue } from "../models/Issue";
import { JiraPort } from "../ports/JiraPort";
import { dotComment, renderBlockerGraph } from "../../utils/dotRenderer";
import { getBlocked, UnresolvedReferencePolicy } from "./BlockerLinker";

export interface BlockerGraphOptions {
  project: string;
  component?: string;
  /** Projects whose issues are only needed to resolve links */
  extraProjects?: string[];
  onUnresolvedReference?: UnresolvedReferencePolicy;
  inwardEdges?: boolean;
}

export function buildJql(project: string, component?: string): string {
  let jql = `project=${project}`;
  if (component !== undefined) {
    jql += ` AND component="${component.replace(/[\\"]/g, "\\$&")}"`;
  }
  return jql;
}

export class BlockerGraphService {
  constructor(
    private jira: JiraPort,
    private log: (line: string) => void = console.log,
    private warn: (message: string) => void = console.warn
  ) {}

  /** Fetch every issue of a project, optionally narrowed to one component */
  async fetchAll(project: string, component?: string): Promise<Issue[]> {
    const jql = buildJql(project, component);
    this.log(dotComment(`JQL: ${jql}`));
    const issues = await this.jira.getIssuesByQuery(jql);
    this.log(dotComment(`Found ${issues.length} matching issues.`));
    return issues;
  }

  /** Fetch, link and render; returns the DOT digraph */
  async run(opts: BlockerGraphOptions): Promise<string> {
    const { project, component, extraProjects = [] } = opts;

    const projectIssues = await this.fetchAll(project);
    const allIssues = [...projectIssues];
    for (const extra of extraProjects) {
      allIssues.push(...(await this.fetchAll(extra)));
    }

    const checkIssues =
      component === undefined
        ? projectIssues
        : await this.fetchAll(project, component);
    this.log(
      dotComment(`${checkIssues.length} in ${component ?? `project ${project}`}`)
    );

    const blocked = getBlocked(checkIssues, allIssues, component, {
      onUnresolvedReference: opts.onUnresolvedReference,
      warn: this.warn,
    });
    return renderBlockerGraph(blocked, { inwardEdges: opts.inwardEdges });
  }
}
