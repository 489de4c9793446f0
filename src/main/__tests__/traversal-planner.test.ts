import fs from 'node:fs';
import path from 'node:path';

import { planDirectories } from '../traversal-planner';
import { makeTempDir, removeDir, touch } from '../../__tests__/helpers/scan-fakes';

describe('planDirectories', () => {
  let tmp: string;
  let photos: string;

  beforeEach(() => {
    tmp = makeTempDir('mv-people-plan');
    photos = path.join(tmp, 'photos');
    fs.mkdirSync(path.join(photos, 'b'), { recursive: true });
    fs.mkdirSync(path.join(photos, 'a', 'z'), { recursive: true });
    fs.mkdirSync(path.join(photos, 'a', 'y'), { recursive: true });
    touch(photos, 'c.jpg');
  });

  afterEach(() => {
    removeDir(tmp);
  });

  it('returns only the folder when not recursive', async () => {
    expect(await planDirectories(photos, false)).toEqual([photos]);
  });

  it('lists every subdirectory, sorted by full path, parents first', async () => {
    expect(await planDirectories(photos, true)).toEqual([
      photos,
      path.join(photos, 'a'),
      path.join(photos, 'a', 'y'),
      path.join(photos, 'a', 'z'),
      path.join(photos, 'b'),
    ]);
  });

  it('does not follow symbolic links to directories', async () => {
    fs.symlinkSync(path.join(photos, 'a'), path.join(photos, 'link'));
    const planned = await planDirectories(photos, true);
    expect(planned).not.toContain(path.join(photos, 'link'));
    expect(planned).toHaveLength(5);
  });

  it('leaves out excluded directories and everything beneath them', async () => {
    expect(await planDirectories(photos, true, [path.join(photos, 'a')])).toEqual([photos, path.join(photos, 'b')]);
  });

  it('ignores an excluded path that contains the folder being planned', async () => {
    expect(await planDirectories(path.join(photos, 'a'), true, [photos])).toEqual([
      path.join(photos, 'a'),
      path.join(photos, 'a', 'y'),
      path.join(photos, 'a', 'z'),
    ]);
  });

  it('fails with a filesystem error when the folder cannot be read', async () => {
    await expect(planDirectories(path.join(tmp, 'missing'), true)).rejects.toMatchObject({
      code: 'FILESYSTEM_ERROR',
    });
  });
});
