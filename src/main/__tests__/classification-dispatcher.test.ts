import fs from 'node:fs';
import path from 'node:path';

import { ClassificationDispatcher, listImageFiles, type ClassifierPool } from '../classification';
import type { ClassificationResult } from '../../file-ops/scan-types';
import { deferred, makeTempDir, removeDir, touch, type Deferred } from '../../__tests__/helpers/scan-fakes';

/** Pool whose answers are released by the test, one file at a time */
class ManualPool implements ClassifierPool {
  readonly size = 2;
  readonly submitted: string[] = [];
  private readonly pending = new Map<string, Deferred<boolean>>();

  async start(): Promise<void> {}

  classify(filePath: string): Promise<boolean> {
    const answer = deferred<boolean>();
    this.pending.set(filePath, answer);
    this.submitted.push(filePath);
    return answer.promise;
  }

  answer(filePath: string, hasPeople: boolean): void {
    this.pending.get(filePath)?.resolve(hasPeople);
  }

  async terminate(): Promise<void> {}
}

async function collect(results: AsyncIterable<ClassificationResult>): Promise<ClassificationResult[]> {
  const collected: ClassificationResult[] = [];
  for await (const result of results) {
    collected.push(result);
  }
  return collected;
}

describe('ClassificationDispatcher', () => {
  it('submits the whole batch up front', async () => {
    const pool = new ManualPool();
    const dispatcher = new ClassificationDispatcher(pool);
    const iterator = dispatcher.classify(['/p/a.jpg', '/p/b.jpg', '/p/c.jpg']);

    const first = iterator.next();
    expect(pool.submitted).toEqual(['/p/a.jpg', '/p/b.jpg', '/p/c.jpg']);

    pool.answer('/p/a.jpg', false);
    expect(await first).toEqual({ done: false, value: { path: '/p/a.jpg', hasPeople: false } });
    await iterator.return(undefined);
  });

  it('yields in input order even when a later file finishes first', async () => {
    const pool = new ManualPool();
    const dispatcher = new ClassificationDispatcher(pool);
    const results = collect(dispatcher.classify(['/p/a.jpg', '/p/b.jpg']));

    pool.answer('/p/b.jpg', true);
    await new Promise((resolve) => setImmediate(resolve));
    pool.answer('/p/a.jpg', false);

    expect(await results).toEqual([
      { path: '/p/a.jpg', hasPeople: false },
      { path: '/p/b.jpg', hasPeople: true },
    ]);
  });

  it('stops yielding once the signal aborts', async () => {
    const pool = new ManualPool();
    const controller = new AbortController();
    const iterator = new ClassificationDispatcher(pool).classify(['/p/a.jpg', '/p/b.jpg'], controller.signal);

    const first = iterator.next();
    pool.answer('/p/a.jpg', true);
    expect(await first).toEqual({ done: false, value: { path: '/p/a.jpg', hasPeople: true } });

    const second = iterator.next();
    controller.abort();
    expect(await second).toEqual({ done: true, value: undefined });
  });

  it('reports the pool size as its worker count', () => {
    expect(new ClassificationDispatcher(new ManualPool()).workerCount).toBe(2);
  });
});

describe('listImageFiles', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = makeTempDir('mv-people-list');
  });

  afterEach(() => {
    removeDir(tmp);
  });

  it('returns image files directly inside the directory, sorted', async () => {
    touch(tmp, 'b.PNG');
    touch(tmp, 'a.jpg');
    touch(tmp, 'notes.txt');
    touch(tmp, 'nested/c.jpg');
    fs.mkdirSync(path.join(tmp, 'folder.jpg'));

    expect(await listImageFiles(tmp)).toEqual([path.join(tmp, 'a.jpg'), path.join(tmp, 'b.PNG')]);
  });

  it('includes links that resolve to a file and skips broken or directory links', async () => {
    const elsewhere = touch(tmp, 'originals/real.jpg');
    fs.symlinkSync(elsewhere, path.join(tmp, 'linked.jpg'));
    fs.symlinkSync(path.join(tmp, 'gone.jpg'), path.join(tmp, 'broken.jpg'));
    fs.symlinkSync(path.join(tmp, 'originals'), path.join(tmp, 'dir-link.jpg'));

    expect(await listImageFiles(tmp)).toEqual([path.join(tmp, 'linked.jpg')]);
  });

  it('rejects when the directory cannot be read', async () => {
    await expect(listImageFiles(path.join(tmp, 'missing'))).rejects.toThrow();
  });
});
