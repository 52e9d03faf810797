import { loadArtifacts } from "./artifacts";
import { runAssessment } from "./assessment";
import { loadInputFile, mergeFields, parseCliArgs, usage } from "./cli-options";
import { artifactPathsFromEnv } from "./config";
import { createSession } from "./history";
import { defaultPatientInput } from "./input";
import { formatPercent, recommendationsFor } from "./recommendations";

/**
 * CLI entrypoint.
 *
 * Pipeline:
 * 1) Merge defaults, the optional input file and field flags.
 * 2) Load the model and scaler (flags override the environment).
 * 3) Run one assessment against a throwaway session.
 * 4) Print the entry and the matching recommendation title as JSON.
 */
export function runCli(argv: readonly string[] = process.argv.slice(2)): void {
  const options = parseCliArgs(argv, artifactPathsFromEnv());

  if (options.help) {
    console.log(usage());
    return;
  }

  const fromFile = options.inputPath ? loadInputFile(options.inputPath) : null;
  const fields = mergeFields(
    { ...defaultPatientInput() },
    fromFile,
    options.overrides
  );

  const { model, scaler } = loadArtifacts(options.artifacts);
  const entry = runAssessment(
    createSession(),
    { status: "ready", model, scaler },
    fields
  );

  const [pNon, pDiab] = entry.result.probabilities;
  const output = {
    entry,
    summary:
      `${entry.result.label} (non-diabetes ${formatPercent(pNon)}, ` +
      `diabetes ${formatPercent(pDiab)})`,
    recommendation: recommendationsFor(entry.input.glucose).title,
  };
  console.log(
    options.pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output)
  );
}

try {
  runCli();
} catch (err) {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
}
