import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const versionCommand = defineCommand({
  meta: {
    name: "version",
    description: "Show temurin-ci version",
  },
  run: () => {
    console.log(`v${getVersion()}`);
  },
});
