/**
 * CLI Tests: full wiring from argv to output, with a scripted gateway
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as nodePath from 'node:path';
import type { FakeGateway } from '@doc-review/core/testing';
import { runCli } from '../src/cli.js';
import type { CliOptions } from '../src/cli.js';
import {
  FIXED_NOW,
  LAST_RUN,
  RecordingTelemetry,
  createScriptedGateway,
  createTempWorkspace,
} from './fixtures.js';
import type { TempWorkspace } from './fixtures.js';

describe('runCli', () => {
  let workspace: TempWorkspace;
  let gateway: FakeGateway;
  let telemetry: RecordingTelemetry;
  let out: string[];
  let err: string[];
  let options: CliOptions;

  const configPath = (): string => nodePath.join(workspace.root, '.doc-review', 'config.json');
  const errLines = (): string[] => err.join('').split('\n');

  async function writeSettings(settings: Record<string, unknown>): Promise<void> {
    await mkdir(nodePath.dirname(configPath()), { recursive: true });
    await writeFile(configPath(), JSON.stringify(settings), 'utf8');
  }

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    gateway = createScriptedGateway();
    telemetry = new RecordingTelemetry();
    out = [];
    err = [];
    options = {
      workspaceRoot: workspace.root,
      io: { out: (text) => out.push(text), err: (text) => err.push(text) },
      gatewayFor: () => gateway,
      clock: () => FIXED_NOW,
      telemetry,
    };
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe('init', () => {
    it('writes a config with the given options', async () => {
      const code = await runCli(['init', '--repo-path', 'docs', '--weekday', 'Friday', '--time', '09:30'], options);

      expect(code).toBe(0);
      expect(out).toEqual([`Wrote ${configPath()}\n`]);
      const saved: unknown = JSON.parse(await readFile(configPath(), 'utf8'));
      expect(saved).toMatchObject({ repoPath: 'docs', defaultWeekday: 'friday', defaultTime: '09:30', lastRun: null });
    });

    it('rejects an unknown weekday', async () => {
      const code = await runCli(['init', '--weekday', 'someday'], options);

      expect(code).toBe(1);
      expect(errLines()).toContain(
        'Error: defaultWeekday must be one of monday, tuesday, wednesday, thursday, friday, saturday, sunday'
      );
    });

    it('does not overwrite an existing config', async () => {
      expect(await runCli(['init'], options)).toBe(0);

      expect(await runCli(['init'], options)).toBe(1);
      expect(errLines()).toContain(`Error: Config already exists at ${configPath()}`);
    });
  });

  describe('review commands', () => {
    beforeEach(async () => {
      await writeSettings({ repoPath: '.', lastRun: LAST_RUN });
    });

    it('lists groups as JSON', async () => {
      const code = await runCli(['list', '--json'], options);

      expect(code).toBe(0);
      const listing: unknown = JSON.parse(out.join(''));
      expect(listing).toMatchObject({
        since: LAST_RUN,
        commitCount: 4,
        details: [
          { group: { groupId: 'guide.md|c4' } },
          { group: { groupId: 'guide.md|c3' } },
          { group: { groupId: 'intro.md|c2' } },
        ],
      });
      expect(errLines()).toContain(`3 change group(s) from 4 commit(s) since ${LAST_RUN}`);
      expect(telemetry.disposed).toBe(true);
    });

    it('passes --weeks-back through to the window', async () => {
      await runCli(['list', '--json', '--weeks-back', '2'], options);

      const listing: unknown = JSON.parse(out.join(''));
      expect(listing).toMatchObject({ since: '2026-09-26T09:00:00.000Z' });
    });

    it('shows one group as text', async () => {
      const code = await runCli(['show', 'intro.md|c2'], options);

      expect(code).toBe(0);
      const lines = out.join('').split('\n');
      expect(lines).toContain('intro.md  (intro.md|c2)');
      expect(lines).toContain('  c2 Add intro');
      expect(lines).toContain('intro merged');
      expect(errLines()).toContain('intro.md by Ada: 1 commit(s)');
    });

    it('fails with exit code 1 for an unknown group', async () => {
      const code = await runCli(['show', 'nope.md|c9'], options);

      expect(code).toBe(1);
      expect(out).toEqual([]);
      expect(errLines()).toContain("[review.show] No change group 'nope.md|c9' in the review window");
      expect(errLines()).toContain(
        `DEBUG [ReviewDomainService.initialize] Initializing review domain in ${workspace.root}`
      );
    });

    it('keeps debug lines out of a successful run', async () => {
      await runCli(['sync'], options);

      expect(errLines().filter((line) => line.startsWith('DEBUG'))).toEqual([]);
    });

    it('syncs, then marks the review done and toggles the order', async () => {
      expect(await runCli(['sync'], options)).toBe(0);
      expect(errLines()).toContain('Synced: Already up to date.');

      expect(await runCli(['mark-reviewed'], options)).toBe(0);
      expect(await runCli(['toggle-sort'], options)).toBe(0);

      const saved: unknown = JSON.parse(await readFile(configPath(), 'utf8'));
      expect(saved).toEqual({ repoPath: '.', lastRun: '2026-10-14T12:00:00.000Z', sortOrder: 'oldest_first' });
      expect(errLines()).toContain('Sort order is now oldest_first');
    });
  });

  it('fails every review command without a config', async () => {
    const code = await runCli(['list'], options);

    expect(code).toBe(1);
    expect(errLines()).toContain(`Error: No config at ${configPath()}; run 'init' first`);
  });

  it('returns 2 for a malformed option value', async () => {
    expect(await runCli(['list', '--weeks-back', 'soon'], options)).toBe(2);
  });

  it('returns 2 for an unknown command', async () => {
    expect(await runCli(['publish'], options)).toBe(2);
  });
});
