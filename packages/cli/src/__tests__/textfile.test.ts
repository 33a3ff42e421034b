import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { writeTextfile } from '../utils/textfile.js';

describe('writeTextfile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'disk-exporter-textfile-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create missing directories and write the content', async () => {
    const path = join(dir, 'metrics', 'disk_exporter.prom');

    await writeTextfile(path, 'ipmitool_exit_code 0\n');

    expect(await readFile(path, 'utf8')).toBe('ipmitool_exit_code 0\n');
    expect(await readdir(join(dir, 'metrics'))).toEqual(['disk_exporter.prom']);
  });

  it('should replace an existing file', async () => {
    const path = join(dir, 'disk_exporter.prom');
    await writeTextfile(path, 'old\n');

    await writeTextfile(path, 'new\n');

    expect(await readFile(path, 'utf8')).toBe('new\n');
  });

  it('should leave no temporary file behind when the rename fails', async () => {
    const path = join(dir, 'occupied');
    await mkdir(join(path, 'child'), { recursive: true });

    await expect(writeTextfile(path, 'x\n')).rejects.toThrow();

    expect((await readdir(dir)).sort()).toEqual(['occupied']);
  });
});
