import fs from 'node:fs';
import path from 'node:path';

import { findExecutable } from '../utils/executable';
import { makeTempDir, removeDir, touch } from '../../__tests__/helpers/scan-fakes';

describe('findExecutable', () => {
  let tmp: string;
  let binary: string;

  beforeEach(() => {
    tmp = makeTempDir('mv-people-path');
    binary = touch(tmp, 'bin/detect-people', '#!/bin/sh\n');
    fs.chmodSync(binary, 0o755);
  });

  afterEach(() => {
    removeDir(tmp);
  });

  it('finds a bare name on the search path, skipping empty and missing entries', () => {
    const searchPath = ['', path.join(tmp, 'nothing'), path.join(tmp, 'bin')].join(path.delimiter);
    expect(findExecutable('detect-people', searchPath)).toBe(binary);
  });

  it('returns null when no search path entry has it', () => {
    expect(findExecutable('detect-people', tmp)).toBeNull();
  });

  it('checks a name with a separator as a path, relative to cwd', () => {
    expect(findExecutable('./bin/detect-people', '', tmp)).toBe(binary);
    expect(findExecutable(binary, '')).toBe(binary);
    expect(findExecutable('/nonexistent/detect-people', path.join(tmp, 'bin'))).toBeNull();
  });

  it('ignores files without the execute bit and directories', () => {
    const plain = touch(tmp, 'bin/not-runnable');
    fs.chmodSync(plain, 0o644);

    expect(findExecutable('not-runnable', path.join(tmp, 'bin'))).toBeNull();
    expect(findExecutable('bin', tmp)).toBeNull();
  });
});
