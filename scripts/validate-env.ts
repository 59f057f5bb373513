#!/usr/bin/env tsx

/**
 * Environment Variable Validation Script
 *
 * Checks that the variables required by the selected LLM and embedding
 * providers are present and that the ontology index can be found.
 */

import * as fs from 'fs';
import * as path from 'path';

import { ConfigurationError, errorMessage } from '../lib/agents/errors';
import {
  PipelineConfig,
  describePipelineConfig,
  loadEnvironment,
  loadPipelineConfig,
} from '../lib/config/pipeline-config';
import { LogConfigManager } from '../lib/logging/log-config';
import { INDEX_FILE_NAME } from '../lib/services/ontology-index';

const OPTIONAL_ENV_VARS = [
  'OPENAI_BASE_URL',
  'EMBEDDING_MODEL',
  'HPO_INDEX_PATH',
  'MAPPING_CONFIDENCE_THRESHOLD',
  'REQUEST_TIMEOUT_MS',
  'WORKFLOW_LOG_LEVEL',
];

function displayValue(name: string, value: string): string {
  if (name.includes('KEY') || name.includes('SECRET')) {
    return `${value.substring(0, 4)}...`;
  }
  return value.length > 50 ? `${value.substring(0, 47)}...` : value;
}

function validateEnvironment(): boolean {
  console.log('🔍 Validating environment variables...\n');
  loadEnvironment();

  let config: PipelineConfig;
  try {
    config = loadPipelineConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.log(`❌ ${error.message}`);
      console.log('\n💡 Add the missing variables to .env.local (see .env.example).');
      return false;
    }
    throw error;
  }

  console.log('📋 Resolved configuration:');
  console.log(JSON.stringify(describePipelineConfig(config), null, 2));

  console.log('\n📋 Optional Variables:');
  for (const name of OPTIONAL_ENV_VARS) {
    const value = process.env[name];
    console.log(value ? `✅ ${name}: ${displayValue(name, value)}` : `⚠️  ${name}: NOT SET`);
  }

  const logErrors = LogConfigManager.validateConfig();
  for (const logError of logErrors) {
    console.log(`⚠️  Logging: ${logError}`);
  }

  const indexFile = path.join(config.indexPath, INDEX_FILE_NAME);
  if (!fs.existsSync(indexFile)) {
    console.log(`\n❌ Ontology index not found at ${indexFile}`);
    return false;
  }
  console.log(`\n✅ Ontology index: ${indexFile}`);
  return true;
}

try {
  if (validateEnvironment()) {
    console.log('\n✅ Environment validation passed!');
  } else {
    console.log('\n❌ Environment validation failed!');
    process.exitCode = 1;
  }
} catch (error) {
  console.error(`❌ Validation error: ${errorMessage(error)}`);
  process.exitCode = 1;
}
