#!/usr/bin/env tsx

/**
 * Maps clinical text to HPO terms from the command line.
 *
 * Usage:
 *   tsx scripts/map-clinical-text.ts "developmental delay, short stature"
 *   tsx scripts/map-clinical-text.ts --input notes.txt --output results.json
 *
 * An input file holds one document per non-empty line.
 */

import * as fs from 'fs';

import { errorMessage } from '../lib/agents/errors';
import { DocumentResult } from '../lib/agents/types';
import { WorkflowLogger } from '../lib/logging/logging';
import { saveResults } from '../lib/workflow/result-writer';
import { PhenotypeMappingOrchestrator } from '../lib/workflow/workflow-orchestrator';

interface CliArgs {
  texts: string[];
  inputFile?: string;
  outputFile: string;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { texts: [], outputFile: 'hpo_mapping_results.json' };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--input' || arg === '-i') {
      args.inputFile = argv[++i];
    } else if (arg === '--output' || arg === '-o') {
      args.outputFile = argv[++i] ?? args.outputFile;
    } else {
      args.texts.push(arg);
    }
  }
  return args;
}

function printResult(result: DocumentResult, index: number): void {
  console.log(`\n📄 Document ${index + 1}: ${result.sourceText.substring(0, 80)}`);
  if (result.state === 'FAILED') {
    console.log(`❌ Failed: ${result.error ?? 'unknown error'}`);
    return;
  }
  for (const outcome of result.termOutcomes) {
    if (outcome.status === 'mapped') {
      const { mapping } = outcome;
      console.log(
        `  ✅ ${outcome.term.standardizedText} → ${mapping.selectedTermId} ${mapping.selectedTermLabel} (${mapping.confidence.toFixed(2)})`,
      );
    } else {
      console.log(`  ⚠️  ${outcome.term.standardizedText}: ${outcome.status}`);
    }
  }
  const { summary } = result;
  console.log(
    `  📊 ${summary.successfullyMapped}/${summary.totalTerms} mapped, ${summary.highConfidenceMapped} high confidence, ` +
      `success rate ${(summary.successRate * 100).toFixed(1)}%, ${result.processingTime.toFixed(2)}s`,
  );
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const texts = [...args.texts];
  if (args.inputFile) {
    const content = await fs.promises.readFile(args.inputFile, 'utf8');
    texts.push(...content.split(/\r?\n/).filter((line) => line.trim() !== ''));
  }
  if (texts.length === 0) {
    console.error('Usage: map-clinical-text [--input file] [--output file] [text ...]');
    process.exitCode = 1;
    return;
  }

  const logger = new WorkflowLogger('map-clinical-text');
  const orchestrator = await PhenotypeMappingOrchestrator.create(undefined, logger);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n⏹  Cancelling remaining documents...');
    controller.abort();
  });

  const results = await orchestrator.batchTransform(texts, { signal: controller.signal });
  results.forEach(printResult);

  const outputPath = await saveResults(results, args.outputFile, logger);
  console.log(`\n💾 Results saved to ${outputPath}`);
  await logger.close();
}

main().catch((error: unknown) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exitCode = 1;
});
