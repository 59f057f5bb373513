import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { createFailedResult } from '../lib/workflow/state-manager';
import { saveResults } from '../lib/workflow/result-writer';

describe('saveResults', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hpo-results-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes indented UTF-8 JSON and creates missing directories', async () => {
    const results = [createFailedResult('患儿发育迟缓', 'Term extraction failed: timeout', 1.5)];
    const target = path.join(dir, 'nested', 'results.json');

    const written = await saveResults(results, target);

    expect(written).toBe(path.resolve(target));
    const content = fs.readFileSync(written, 'utf8');
    expect(content).toContain('  "sourceText": "患儿发育迟缓"');
    expect(JSON.parse(content)).toEqual(results);
  });

  it('writes an empty list', async () => {
    const written = await saveResults([], path.join(dir, 'empty.json'));
    expect(fs.readFileSync(written, 'utf8')).toBe('[]');
  });
});
