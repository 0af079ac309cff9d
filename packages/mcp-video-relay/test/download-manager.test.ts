import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DownloadManager } from '../src/download/download-manager.ts';
import { listDir, makeOutput, makeTempRoot } from './fakes.ts';

describe('DownloadManager', () => {
  let root: string;
  let manager: DownloadManager;

  beforeEach(async () => {
    root = await makeTempRoot();
    manager = new DownloadManager({ baseUrl: 'http://relay.test/', defaultSessionTimeoutMin: 30 });
  });

  afterEach(async () => {
    await manager.dispose();
    await rm(root, { recursive: true, force: true });
  });

  it('publishes the video under a token URL', async () => {
    const output = await makeOutput(root);
    const { video, thumbnail } = await manager.publish(output);

    assert.equal(thumbnail, null);
    assert.equal(video.download_url, `http://relay.test/download/${video.token}`);
    assert.equal(video.kind, 'video');
    assert.equal(video.filename, 'out.mp4');
    assert.equal(video.file_size, 5);
    assert.equal(video.mime_type, 'video/mp4');
    assert.equal(video.status, 'active');
    assert.equal(Date.parse(video.expires_at) - Date.parse(video.created_at), 30 * 60 * 1000);
    assert.equal(manager.getSession(video.token)?.absolutePath, output.videoPath);
  });

  it('keeps the storage until every artifact of the task is done', async () => {
    const output = await makeOutput(root);
    const thumbnailPath = join(output.storage.path, 'thumbnail.jpg');
    await writeFile(thumbnailPath, 'jpg');
    const { video, thumbnail } = await manager.publish({ ...output, thumbnailPath });

    assert.ok(thumbnail);
    assert.equal(thumbnail.mime_type, 'image/jpeg');
    assert.equal(thumbnail.file_size, 3);

    assert.equal(await manager.completeSession(video.token), true);
    assert.equal(output.storage.isReleased, false);
    assert.equal(existsSync(output.storage.path), true);

    assert.equal(await manager.completeSession(thumbnail.token), true);
    assert.equal(output.storage.isReleased, true);
    assert.equal(existsSync(output.storage.path), false);

    assert.equal(await manager.completeSession(video.token), false);
  });

  it('closes sessions and reports why a close did nothing', async () => {
    const first = await manager.publish(await makeOutput(root));
    const second = await manager.publish(await makeOutput(root));

    assert.equal(await manager.closeSession('no-such-token'), 'not_found');

    await manager.completeSession(first.video.token);
    assert.equal(await manager.closeSession(first.video.token), 'already_downloaded');

    assert.equal(await manager.closeSession(second.video.token), 'closed');
    assert.equal(manager.getSession(second.video.token)?.status, 'closed');
    assert.deepEqual(await listDir(root), []);
  });

  it('expires sessions on sweep and forgets them after the retention window', async () => {
    const output = await makeOutput(root);
    const { video } = await manager.publish(output, 1);
    const createdAt = Date.parse(video.created_at);

    await manager.sweep(new Date(createdAt + 2 * 60 * 1000));
    assert.equal(manager.getSession(video.token)?.status, 'expired');
    assert.equal(existsSync(output.storage.path), false);
    assert.deepEqual(manager.listSessions(), []);
    assert.equal(manager.listSessions(false).length, 1);

    await manager.sweep(new Date(createdAt + 2 * 60 * 60 * 1000));
    assert.equal(manager.getSession(video.token), null);
  });

  it('releases the storage when publishing fails', async () => {
    const output = await makeOutput(root);

    await assert.rejects(manager.publish({ ...output, videoPath: join(output.storage.path, 'missing.mp4') }));
    assert.equal(output.storage.isReleased, true);
    assert.deepEqual(manager.listSessions(false), []);
  });

  it('releases everything it still holds on dispose', async () => {
    const a = await makeOutput(root);
    const b = await makeOutput(root);
    await manager.publish(a);
    await manager.publish(b);

    await manager.dispose();
    assert.equal(a.storage.isReleased, true);
    assert.equal(b.storage.isReleased, true);
    assert.deepEqual(await listDir(root), []);
  });
});
