export type LinkDirection = "outward" | "inward";

export interface IssueLink {
  type: string;
  direction: LinkDirection;
  targetKey: string;
}

export interface Issue {
  id: string;
  key: string;
  status: string;
  priority?: string;
  severity?: string;
  components: string[];
  links: IssueLink[];
}
