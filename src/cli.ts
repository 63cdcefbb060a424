import yargs from "yargs";
import { JiraConfig } from "./domain/models/ConfigModels";
import { BlockerGraphOptions } from "./domain/services/BlockerGraphService";
import { isPositiveInteger, jiraDefaults } from "./config";

export const USAGE_EXIT_CODE = 42;

export interface CliRequest {
  connection: Omit<JiraConfig, "password"> & { pageSize: number };
  graph: BlockerGraphOptions;
}

/** Environment password first, otherwise ask */
export async function resolvePassword(
  envPassword: string | undefined,
  prompt: () => Promise<string>
): Promise<string> {
  return envPassword ?? (await prompt());
}

export function createCli(
  args: string[],
  handler: (request: CliRequest) => Promise<void>,
  exit: (code: number) => void = process.exit
) {
  return yargs(args)
    .scriptName("jira-blockers")
    .command(
      "$0 <user> <server> <project> [component]",
      "Print a DOT digraph of the issues of a component that block " +
        "High/Highest priority or Major severity issues of other components",
      (y) =>
        y
          .positional("user", { type: "string", demandOption: true })
          .positional("server", {
            type: "string",
            demandOption: true,
            describe: "Jira base URL, e.g. https://jira.example.com",
          })
          .positional("project", { type: "string", demandOption: true })
          .positional("component", { type: "string" })
          .option("extra-project", {
            type: "string",
            array: true,
            describe: "Additional project whose issues may be linked to",
          })
          .option("page-size", {
            type: "number",
            default: jiraDefaults.pageSize,
          })
          .option("severity-field", {
            type: "string",
            default: jiraDefaults.severityField,
          })
          .option("api-version", {
            type: "string",
            default: jiraDefaults.apiVersion,
          })
          .option("skip-unresolved", {
            type: "boolean",
            default: false,
            describe: "Warn about links to issues that were not fetched instead of failing",
          })
          .option("inward-edges", {
            type: "boolean",
            default: false,
            describe: "Also draw 'is blocked by' relations as dashed edges",
          })
          .check((argv) =>
            isPositiveInteger(argv["page-size"])
              ? true
              : `--page-size must be a positive integer, got ${argv["page-size"]}`
          ),
      (argv) =>
        handler({
          connection: {
            baseUrl: argv.server,
            user: argv.user,
            apiVersion: argv.apiVersion,
            pageSize: argv.pageSize,
            severityField: argv.severityField,
          },
          graph: {
            project: argv.project,
            component: argv.component,
            extraProjects: argv.extraProject,
            onUnresolvedReference: argv.skipUnresolved ? "skip" : "fail",
            inwardEdges: argv.inwardEdges,
          },
        })
    )
    .fail((msg, err, y) => {
      if (err) throw err;
      console.error(msg);
      y.showHelp();
      exit(USAGE_EXIT_CODE);
    })
    .strict()
    .help();
}
