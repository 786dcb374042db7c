import { type Command, Option } from "commander";
import {
  ALPHA_SPEC_CHECK_NAME,
  ALPHA_SPEC_MODES,
  type AlphaSpecOptions,
  createAlphaSpecCheck,
  isAlphaSpecMode
} from "../checks/alpha-spec.mjs";
import { ConfigurationError } from "../errors.mjs";
import { LintMain } from "../main.mjs";
import { MetadataCache } from "../utils/metadata.mjs";
import { type CliContext, type CommonOptions, lintCommand } from "./shared.mjs";

interface AlphaSpecCommandOptions extends CommonOptions {
  mode: string;
  rapidsVersion?: string;
  rapidsVersionFile: string;
  rapidsMetadataFile?: string;
}

export function registerAlphaSpecCommand(program: Command, context: CliContext): void {
  lintCommand(
    program,
    ALPHA_SPEC_CHECK_NAME,
    "Verify that RAPIDS packages in dependencies.yaml do (or do not) have the alpha spec."
  )
    .addOption(
      new Option("--mode <mode>", "development has the alpha spec, release does not")
        .choices(ALPHA_SPEC_MODES)
        .default("development")
    )
    .option("--rapids-version <version>", "RAPIDS version to use (default: read from the version file)")
    .option("--rapids-version-file <file>", "file to read the RAPIDS version from", "VERSION")
    .option("--rapids-metadata-file <file>", "JSON release metadata to use instead of the bundled table")
    .action((files: string[], options: AlphaSpecCommandOptions) => {
      const { mode } = options;
      if (!isAlphaSpecMode(mode)) {
        throw new ConfigurationError(`invalid mode: ${mode}`);
      }
      const main = new LintMain<AlphaSpecOptions>(ALPHA_SPEC_CHECK_NAME, context.reporter);
      main.addCheck(createAlphaSpecCheck(new MetadataCache(options.rapidsMetadataFile)));
      context.setExitCode(
        main.run({
          files,
          fix: options.fix ?? false,
          mode,
          rapidsVersion: options.rapidsVersion,
          rapidsVersionFile: options.rapidsVersionFile
        })
      );
    });
}
