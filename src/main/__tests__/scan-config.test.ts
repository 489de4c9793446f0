import fs from 'node:fs';
import path from 'node:path';

import { buildScanRequest, resolveScanConfig } from '../scan-config';
import { isScanError } from '../../utils/error-handling';
import { makeTempDir, removeDir } from '../../__tests__/helpers/scan-fakes';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('buildScanRequest', () => {
  it('resolves relative paths against the working directory', () => {
    expect(buildScanRequest({ folder: 'images', archiveDir: './archive', recursive: false }, '/data')).toEqual({
      folder: '/data/images',
      archiveDir: '/data/archive',
      root: undefined,
      recursive: false,
    });
  });

  it('uses the folder as root for a recursive scan without one', () => {
    const request = buildScanRequest({ folder: '/data/images', archiveDir: '/archive', recursive: true });
    expect(request.root).toBe('/data/images');
  });

  it('keeps an explicit root that contains the folder', () => {
    const request = buildScanRequest({
      folder: '/data/images/vacation',
      archiveDir: '/archive',
      root: '/data',
      recursive: true,
    });
    expect(request.root).toBe('/data');
  });

  it('rejects a folder outside root as an invalid request', () => {
    const error = captureError(() =>
      buildScanRequest({ folder: '/data/images', archiveDir: '/archive', root: '/other', recursive: false })
    );

    expect(isScanError(error)).toBe(true);
    expect(error).toMatchObject({
      code: 'INVALID_REQUEST',
      message: "Scanned folder '/data/images' is not under root '/other'",
    });
  });

  it('returns a frozen request', () => {
    expect(Object.isFrozen(buildScanRequest({ folder: '/a', archiveDir: '/b', recursive: false }))).toBe(true);
  });
});

describe('resolveScanConfig', () => {
  let tmp: string;
  let photos: string;

  beforeEach(() => {
    tmp = makeTempDir('mv-people-config');
    photos = path.join(tmp, 'photos');
    fs.mkdirSync(photos);
  });

  afterEach(() => {
    removeDir(tmp);
  });

  it('splits the detector command and applies defaults', () => {
    const config = resolveScanConfig({ folder: photos, detector: 'detect-people --threshold 0.6', workers: 3 }, {}, tmp);

    expect(config).toEqual({
      request: { folder: photos, archiveDir: path.join(tmp, 'archive'), root: undefined, recursive: false },
      workers: 3,
      detector: { kind: 'command', command: 'detect-people', args: ['--threshold', '0.6'], timeoutMs: 60_000 },
      declinedRescan: 'abort',
    });
  });

  it('reads the detector, timeout and worker count from the environment', () => {
    const config = resolveScanConfig(
      { folder: photos },
      {
        MV_PEOPLE_DETECTOR: 'detect-people',
        MV_PEOPLE_DETECTOR_TIMEOUT_MS: '5000',
        MV_PEOPLE_WORKERS: '4',
      },
      tmp
    );

    expect(config.detector).toEqual({ kind: 'command', command: 'detect-people', args: [], timeoutMs: 5_000 });
    expect(config.workers).toBe(4);
  });

  it('lets options win over the environment', () => {
    const config = resolveScanConfig(
      { folder: photos, detector: 'from-flag', detectorTimeoutMs: 100, workers: 2, onDeclinedRescan: 'skip' },
      { MV_PEOPLE_DETECTOR: 'from-env', MV_PEOPLE_DETECTOR_TIMEOUT_MS: '5000', MV_PEOPLE_WORKERS: '4' },
      tmp
    );

    expect(config.detector).toMatchObject({ command: 'from-flag', timeoutMs: 100 });
    expect(config.workers).toBe(2);
    expect(config.declinedRescan).toBe('skip');
  });

  it('requires a detector', () => {
    expect(() => resolveScanConfig({ folder: photos }, {}, tmp)).toThrow(
      'No detector configured. Pass --detector <command> or set MV_PEOPLE_DETECTOR.'
    );
  });

  it('rejects a folder that does not exist', () => {
    const missing = path.join(tmp, 'missing');
    expect(captureError(() => resolveScanConfig({ folder: missing, detector: 'd' }, {}, tmp))).toMatchObject({
      code: 'INVALID_REQUEST',
      message: `folder '${missing}' does not exist`,
    });
  });

  it('rejects a malformed environment value', () => {
    expect(
      captureError(() => resolveScanConfig({ folder: photos, detector: 'd' }, { MV_PEOPLE_WORKERS: 'many' }, tmp))
    ).toMatchObject({ code: 'INVALID_REQUEST' });
  });

  it('rejects a worker count of zero', () => {
    expect(captureError(() => resolveScanConfig({ folder: photos, detector: 'd', workers: 0 }, {}, tmp))).toMatchObject({
      code: 'INVALID_REQUEST',
    });
  });
});
