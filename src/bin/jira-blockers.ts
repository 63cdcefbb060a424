#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import { JiraAdapter } from "../adapters/jira/JiraAdapter";
import { JiraClient } from "../adapters/jira/JiraClient";
import { BlockerGraphService } from "../domain/services/BlockerGraphService";
import { promptPassword } from "../utils/promptPassword";
import { createCli, resolvePassword } from "../cli";
import { jiraDefaults } from "../config";

async function main() {
  await createCli(hideBin(process.argv), async ({ connection, graph }) => {
    const password = await resolvePassword(jiraDefaults.password, () =>
      promptPassword()
    );
    const jira = new JiraAdapter(new JiraClient({ ...connection, password }), {
      pageSize: connection.pageSize,
      severityField: connection.severityField,
    });
    console.log(await new BlockerGraphService(jira).run(graph));
  }).parseAsync();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
