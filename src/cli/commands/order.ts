import { loadEngineSettings, resolveFiles } from "../../config.js";
import { ConfigurationError, errorMessage } from "../../errors.js";
import { ENTITY_DEFINITIONS } from "../../mapping/entities/index.js";
import { defaultDeletePolicy } from "../../sync/engine.js";
import { dependenciesOf, orderDefinitions } from "../../sync/graph.js";
import { displayPassOrder, printError } from "../utils/display.js";
import {
  addExtractOptions,
  toOverrides,
  type ExtractOptions,
} from "../utils/options.js";

import type { Command } from "commander";

// ============================================================================
// Order Command
// ============================================================================

export function registerOrderCommand(program: Command): void {
  const order = program
    .command("order")
    .description("Show the pass order, dependencies and delete policies")
    .option(
      "--delete-policy <policies>",
      "Per-type delete policy overrides (env: SYNC_DELETE_POLICY)"
    );

  addExtractOptions(order);

  order.action((options: ExtractOptions & { deletePolicy?: string }) => {
    try {
      const overrides = toOverrides(options);
      const { deletePolicies } = loadEngineSettings(overrides);

      // file names are shown only when an extract location is configured
      let files: Partial<Record<string, string>> = {};
      try {
        files = resolveFiles(ENTITY_DEFINITIONS, overrides);
      } catch (error) {
        if (!(error instanceof ConfigurationError)) {
          throw error;
        }
      }

      displayPassOrder(
        orderDefinitions(ENTITY_DEFINITIONS).map((definition) => ({
          type: definition.type,
          label: definition.label,
          dependsOn: dependenciesOf(definition),
          deletePolicy:
            deletePolicies[definition.type] ?? defaultDeletePolicy(definition),
          file: files[definition.type],
        }))
      );
    } catch (error) {
      printError(errorMessage(error));
      process.exitCode = 1;
    }
  });
}
