import { existsSync } from "node:fs";
import { join, relative } from "node:path";
import { CONFIG_FILE_NAME, ConfigManager, findProjectRoot } from "./lib/config";
import { CaseSynthesizer } from "./lib/case-synthesizer";
import { buildCaseReport, writeCaseReport } from "./lib/case-report";
import { globalSynthesisAudit } from "./lib/audit";
import { globalLogger } from "./lib/logger";
import { loadManualCaseFile, mergeManualCases } from "./lib/manual-cases";
import { ModuleLoader } from "./lib/module-loader";
import { createDeadline, OracleRunner } from "./lib/oracle-runner";
import { SignatureReader } from "./lib/signatures";
import { StructureAnalyzer } from "./lib/structure-analyzer";
import { ValueSynthesizer } from "./lib/value-synthesizer";

// the compiled entry runs from dist/, so the root comes from the working directory
const PROJECT_ROOT = findProjectRoot(process.cwd());
const CONFIG_PATH = join(PROJECT_ROOT, CONFIG_FILE_NAME);

const configManager = new ConfigManager(PROJECT_ROOT, CONFIG_PATH);
configManager.loadEnvironment();
globalLogger.setLevel(configManager.getLogLevel());

async function processFile(entryPath: string, manualCasesPath?: string): Promise<void> {
  const sourcePath = configManager.expandPath(entryPath);
  if (!existsSync(sourcePath)) {
    throw new Error(`Source file not found: ${sourcePath}`);
  }

  const logger = globalLogger;
  const audit = globalSynthesisAudit;
  const seed = configManager.getSeed();

  logger.startTimer("casegen");
  const catalog = new SignatureReader({ numberKind: configManager.getNumberKind(), logger }).readFile(sourcePath);
  const namespace = new ModuleLoader({ logger }).load(sourcePath);

  const synthesizer = new CaseSynthesizer({
    numRandomCases: configManager.getNumRandomCases(),
    perCallDeadlineSeconds: configManager.getPerCallDeadlineSeconds(),
    maxConstructionAttempts: configManager.getMaxConstructionAttempts(),
    catalog,
    logger,
    audit,
    values: new ValueSynthesizer({ seed, logger }),
    oracle: new OracleRunner({ deadline: createDeadline(configManager.getDeadlineMode()), logger }),
    analyzer: new StructureAnalyzer({ catalog, logger }),
  });

  const cases = await synthesizer.synthesizeModule(namespace);

  if (manualCasesPath) {
    const rows = loadManualCaseFile(configManager.expandPath(manualCasesPath));
    const merged = mergeManualCases(cases, rows, namespace, logger);
    logger.info(`Merged ${merged} of ${rows.length} manual cases`);
  }

  const report = buildCaseReport(relative(PROJECT_ROOT, sourcePath), cases, audit);
  const outputPath = writeCaseReport(report, configManager.expandPath(configManager.getOutputDir()));

  const summary = audit.getSummary();
  logger.endTimer("casegen", "Case generation finished", "info");
  logger.info(`Wrote ${summary.totalRecorded} cases to ${relative(PROJECT_ROOT, outputPath)}`, {
    deduped: summary.totalDeduped,
    timeouts: summary.totalTimeouts,
    seed: seed ?? "random",
  });
  for (const timeout of audit.getTimeouts()) {
    logger.warn(`Timed out: ${timeout.target} ${timeout.inputs}`, { phase: timeout.phase });
  }

  const counts = logger.countByLevel();
  if (counts.warn > 0 || counts.error > 0) {
    logger.info(`Finished with ${counts.warn} warnings and ${counts.error} errors`);
  }
}

async function main(): Promise<void> {
  // Allow specifying source file via CLI arg or env var
  const sourceFile =
    process.argv[2] ||                              // CLI arg: npm run casegen src/myfile.ts
    process.env.CASEGEN_SOURCE_FILE ||             // Env var
    "examples/shapes.ts";                           // Default fallback
  const manualCases = process.argv[3] || process.env.CASEGEN_MANUAL_CASES;

  globalLogger.info(`Processing: ${sourceFile}`);
  await processFile(sourceFile, manualCases);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
