import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { delimiter, join } from 'node:path';
import { findExecutable } from '../utils/which.js';

describe('findExecutable', () => {
  let first: string;
  let second: string;

  beforeEach(async () => {
    first = await mkdtemp(join(tmpdir(), 'disk-exporter-which-'));
    second = await mkdtemp(join(tmpdir(), 'disk-exporter-which-'));

    await writeFile(join(first, 'ipmitool'), '');
    await chmod(join(first, 'ipmitool'), 0o644);
    await writeFile(join(second, 'ipmitool'), '#!/bin/sh\n');
    await chmod(join(second, 'ipmitool'), 0o755);
  });

  afterEach(async () => {
    await rm(first, { recursive: true, force: true });
    await rm(second, { recursive: true, force: true });
  });

  it('should return the first executable match on PATH', async () => {
    const path = [first, second].join(delimiter);

    await expect(findExecutable('ipmitool', path)).resolves.toBe(join(second, 'ipmitool'));
  });

  it('should check paths with a slash as given', async () => {
    await expect(findExecutable(join(second, 'ipmitool'), '')).resolves.toBe(join(second, 'ipmitool'));
    await expect(findExecutable(join(second, 'perccli64'), second)).resolves.toBeNull();
  });

  it('should return null when nothing matches', async () => {
    await expect(findExecutable('smartctl', [first, second].join(delimiter))).resolves.toBeNull();
    await expect(findExecutable('smartctl', '')).resolves.toBeNull();
  });
});
