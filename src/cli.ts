export {
  RunMigrateCLI,
  createCLIConsoleLogger,
  readManagerOptionsFromEnv,
  type CLILoggerFunction,
} from "./lib/built-in-cli";
