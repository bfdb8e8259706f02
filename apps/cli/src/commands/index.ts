import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "temurin-ci",
    version: getVersion(),
    description: "Jenkins console log utilities for Temurin release pipelines",
  },
  subCommands: {
    "extract-triggers": () =>
      import("./extract-triggers.js").then((m) => m.extractTriggersCommand),
    "get-console": () =>
      import("./get-console.js").then((m) => m.getConsoleCommand),
    "get-spawned": () =>
      import("./get-spawned.js").then((m) => m.getSpawnedCommand),
    "create-release-issue": () =>
      import("./create-release-issue.js").then(
        (m) => m.createReleaseIssueCommand
      ),
    version: () => import("./version.js").then((m) => m.versionCommand),
  },
});
