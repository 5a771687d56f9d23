/**
 * Output Snapshot Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { SofExtractionOutput } from '@sof-extract/shared';
import { OutputSnapshot } from '../../services/worker-sof-extractor/src/lib/snapshot';
import { makeRecord, sleep } from './helpers';

function output(fileName: string): SofExtractionOutput {
  return { ...makeRecord(), fileName };
}

function readSnapshot(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

describe('OutputSnapshot', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sof-snapshot-'));
    filePath = path.join(dir, 'output.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the file on first append', async () => {
    const snapshot = new OutputSnapshot(filePath, 60_000);

    await snapshot.append(output('sof-a.pdf'));

    expect(readSnapshot(filePath)).toEqual([output('sof-a.pdf')]);
  });

  it('appends to existing outputs', async () => {
    const snapshot = new OutputSnapshot(filePath, 60_000);

    await Promise.all([snapshot.append(output('sof-a.pdf')), snapshot.append(output('sof-b.pdf'))]);

    expect(readSnapshot(filePath)).toEqual([output('sof-a.pdf'), output('sof-b.pdf')]);
  });

  it('starts over when the file is not a JSON array', async () => {
    fs.writeFileSync(filePath, 'not json', 'utf-8');
    const snapshot = new OutputSnapshot(filePath, 60_000);

    await snapshot.append(output('sof-a.pdf'));

    expect(readSnapshot(filePath)).toEqual([output('sof-a.pdf')]);
  });

  it('wipes the file to an empty array', async () => {
    const snapshot = new OutputSnapshot(filePath, 60_000);
    await snapshot.append(output('sof-a.pdf'));

    await snapshot.wipe();

    expect(fs.readFileSync(filePath, 'utf-8')).toBe('[]');
  });

  it('wipes once the TTL elapses', async () => {
    const snapshot = new OutputSnapshot(filePath, 20);
    await snapshot.append(output('sof-a.pdf'));

    snapshot.scheduleWipe();
    await sleep(150);

    expect(fs.readFileSync(filePath, 'utf-8')).toBe('[]');
  });

  it('keeps the first deadline while jobs arrive faster than the TTL', async () => {
    const snapshot = new OutputSnapshot(filePath, 100);

    for (let i = 0; i < 6; i++) {
      await snapshot.append(output(`doc-${i}.pdf`));
      snapshot.scheduleWipe();
      await sleep(60);
    }

    const contents = fs.readFileSync(filePath, 'utf-8');
    expect(contents).not.toContain('doc-0.pdf');
    expect(contents).not.toContain('doc-1.pdf');

    await snapshot.close();
  });

  it('wipes immediately on close', async () => {
    const snapshot = new OutputSnapshot(filePath, 60_000);
    await snapshot.append(output('sof-a.pdf'));
    snapshot.scheduleWipe();

    await snapshot.close();

    expect(fs.readFileSync(filePath, 'utf-8')).toBe('[]');
  });

  it('does not throw when the wipe cannot write', async () => {
    const snapshot = new OutputSnapshot(path.join(dir, 'missing', 'output.json'), 60_000);

    await expect(snapshot.wipe()).resolves.toBeUndefined();
  });

  it('rejects an append that cannot be written and keeps accepting work', async () => {
    const snapshot = new OutputSnapshot(path.join(dir, 'missing', 'output.json'), 60_000);

    await expect(snapshot.append(output('sof-a.pdf'))).rejects.toThrow('ENOENT');
    await expect(snapshot.wipe()).resolves.toBeUndefined();
  });
});
