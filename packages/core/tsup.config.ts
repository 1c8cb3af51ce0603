import { createNodeConfig } from "../../tsup.config.base";

export default createNodeConfig({
  entry: ["src/index.ts", "src/process-logging.ts"],
  externalizeDeps: true,
});
