/**
 * Tests for Workbook Management Tools
 *
 * @module tests/unit/tools/workbook
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { existsSync } from 'fs';
import { join } from 'path';
import { createWorkbookTools } from '../../../src/tools/workbook.js';
import {
  cleanupTempDir,
  createTempDir,
  createTestConfig,
  parseResponse,
} from '../../helpers/index.js';

describe('Workbook Tools', () => {
  let tempDir: string;
  let workbookPath: string;
  let tools: ReturnType<typeof createWorkbookTools>;

  beforeEach(() => {
    tempDir = createTempDir('test-eval-workbook-');
    workbookPath = join(tempDir, 'data', 'notices-testing.db');
    tools = createWorkbookTools(createTestConfig(workbookPath));
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  it('eval_workbook_info reports a missing workbook and all sheets missing', async () => {
    const data = parseResponse(await tools.eval_workbook_info.handler({}));

    expect(data.success).toBe(true);
    expect(data.data.exists).toBe(false);
    expect(data.data.path).toBe(workbookPath);
    expect(data.data.path_source).toBe('env');
    expect(data.data.missing_sheets).toEqual(['Master', '2.5 Flash', 'GPT 5.1', 'GPT 5-Mini']);
    expect(existsSync(workbookPath)).toBe(false);
  });

  it('eval_workbook_init creates every sheet once', async () => {
    const first = parseResponse(await tools.eval_workbook_init.handler({}));
    const second = parseResponse(await tools.eval_workbook_init.handler({}));

    expect(first.data.created).toEqual(['Master', '2.5 Flash', 'GPT 5.1', 'GPT 5-Mini']);
    expect(first.data.repaired).toEqual([]);
    expect(second.data.created).toEqual([]);

    const info = parseResponse(await tools.eval_workbook_info.handler({}));
    expect(info.data.exists).toBe(true);
    expect(info.data.missing_sheets).toEqual([]);
  });

  it('eval_workbook_init repairs a drifted model sheet but never clears Master', async () => {
    await tools.eval_workbook_init.handler({});
    const db = new Database(workbookPath);
    db.exec('DROP TABLE "Master"');
    db.exec('CREATE TABLE "Master" ("PDF Name" TEXT, "Notes" TEXT)');
    db.prepare('INSERT INTO "Master" VALUES (?, ?)').run('keep.pdf', 'curated');
    db.exec('DROP TABLE "GPT 5.1"');
    db.exec('CREATE TABLE "GPT 5.1" ("PDF Name" TEXT)');
    db.close();

    const data = parseResponse(await tools.eval_workbook_init.handler({}));
    expect(data.data.repaired).toEqual(['GPT 5.1']);

    const info = parseResponse(await tools.eval_workbook_info.handler({}));
    const sheets = new Map(
      info.data.sheets.map((s: { name: string; row_count: number; header_valid: boolean }) => [s.name, s])
    );
    expect(sheets.get('Master')).toEqual({ name: 'Master', row_count: 1, header_valid: false });
    expect(sheets.get('GPT 5.1')).toEqual({ name: 'GPT 5.1', row_count: 0, header_valid: true });
  });
});
