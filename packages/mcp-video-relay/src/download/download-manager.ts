/**
 * Download Session Manager
 *
 * Hands finished artifacts to users through short-lived download sessions kept in memory.
 * Each session is identified by a random token embedded in its URL, is single-use and
 * expires after a timeout.
 *
 * The manager takes ownership of a task's temp storage when the artifacts are published.
 * All sessions of one task (video and thumbnail) share that storage, which is removed once
 * none of them is active any more.
 */

import { randomUUID } from 'node:crypto';
import { stat } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { TempStorage } from '../pipeline/temp-storage.ts';
import type { TaskOutput } from '../queue/task.ts';
import { logger } from '../utils/logger.ts';

export type DownloadSessionStatus = 'active' | 'downloaded' | 'expired' | 'closed';

export type ArtifactKind = 'video' | 'thumbnail';

export interface DownloadSession {
  token: string;
  groupId: string;
  kind: ArtifactKind;
  absolutePath: string;
  filename: string;
  fileSize: number;
  mimeType: string;
  createdAt: Date;
  expiresAt: Date;
  status: DownloadSessionStatus;
}

/** Serialised session representation returned by tools and the info route */
export interface DownloadSessionInfo {
  token: string;
  download_url: string;
  kind: ArtifactKind;
  filename: string;
  file_size: number;
  mime_type: string;
  status: DownloadSessionStatus;
  created_at: string;
  expires_at: string;
}

export interface PublishedArtifacts {
  video: DownloadSessionInfo;
  thumbnail: DownloadSessionInfo | null;
}

interface ArtifactGroup {
  storage: TempStorage;
  tokens: string[];
}

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;
/** Finished sessions stay listed this long before they are forgotten. */
const RETENTION_MS = 60 * 60 * 1000;

const MIME_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
};

function guessMimeType(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DownloadManager {
  private sessions = new Map<string, DownloadSession>();
  private groups = new Map<string, ArtifactGroup>();
  private cleanupTimer: ReturnType<typeof setInterval>;
  private baseUrl: string;
  private defaultSessionTimeoutMin: number;

  constructor(options: { baseUrl: string; defaultSessionTimeoutMin?: number }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.defaultSessionTimeoutMin = options.defaultSessionTimeoutMin ?? 60;

    this.cleanupTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Download session cleanup failed');
      });
    }, CLEANUP_INTERVAL_MS);
    this.cleanupTimer.unref();
  }

  /**
   * Opens download sessions for a task's video (and thumbnail, if any) and takes over its
   * temp storage.
   */
  async publish(output: TaskOutput, expiresInMinutes?: number): Promise<PublishedArtifacts> {
    const groupId = randomUUID();
    const group: ArtifactGroup = { storage: output.storage, tokens: [] };
    this.groups.set(groupId, group);

    try {
      const video = await this.openSession(groupId, 'video', output.videoPath, expiresInMinutes);
      const thumbnail = output.thumbnailPath
        ? await this.openSession(groupId, 'thumbnail', output.thumbnailPath, expiresInMinutes)
        : null;
      return { video, thumbnail };
    } catch (error) {
      for (const token of group.tokens) this.sessions.delete(token);
      this.groups.delete(groupId);
      await output.storage.release();
      throw error;
    }
  }

  private async openSession(
    groupId: string,
    kind: ArtifactKind,
    absolutePath: string,
    expiresInMinutes?: number,
  ): Promise<DownloadSessionInfo> {
    const { size } = await stat(absolutePath);
    const token = randomUUID();
    const now = new Date();
    const timeout = expiresInMinutes ?? this.defaultSessionTimeoutMin;
    const filename = basename(absolutePath);

    const session: DownloadSession = {
      token,
      groupId,
      kind,
      absolutePath,
      filename,
      fileSize: size,
      mimeType: guessMimeType(filename),
      createdAt: now,
      expiresAt: new Date(now.getTime() + timeout * 60 * 1000),
      status: 'active',
    };

    this.sessions.set(token, session);
    this.groups.get(groupId)?.tokens.push(token);

    logger.info({ token, kind, fileSize: size, expiresAt: session.expiresAt.toISOString() }, 'Download session created');
    return this.toSessionInfo(session);
  }

  /**
   * Returns a session for the given token, or null.
   * Marks expired sessions on the way.
   */
  getSession(token: string): DownloadSession | null {
    const session = this.sessions.get(token);
    if (!session) return null;

    if (this.expireIfDue(session)) {
      this.releaseGroupInBackground(session.groupId);
    }
    return session;
  }

  /** Marks a session as downloaded after the file was delivered. */
  async completeSession(token: string): Promise<boolean> {
    const session = this.sessions.get(token);
    if (!session || session.status !== 'active') return false;

    session.status = 'downloaded';
    logger.info({ token, filename: session.filename }, 'Download session completed');
    await this.releaseGroupIfDone(session.groupId);
    return true;
  }

  /** Revokes a session. */
  async closeSession(token: string): Promise<'closed' | 'not_found' | 'already_downloaded'> {
    const session = this.sessions.get(token);
    if (!session) return 'not_found';
    if (session.status === 'downloaded') return 'already_downloaded';

    session.status = 'closed';
    logger.info({ token }, 'Download session closed');
    await this.releaseGroupIfDone(session.groupId);
    return 'closed';
  }

  listSessions(activeOnly = true): DownloadSessionInfo[] {
    const results: DownloadSessionInfo[] = [];
    for (const session of this.sessions.values()) {
      if (this.expireIfDue(session)) {
        this.releaseGroupInBackground(session.groupId);
      }
      if (activeOnly && session.status !== 'active') continue;
      results.push(this.toSessionInfo(session));
    }
    return results;
  }

  private toSessionInfo(session: DownloadSession): DownloadSessionInfo {
    return {
      token: session.token,
      download_url: `${this.baseUrl}/download/${session.token}`,
      kind: session.kind,
      filename: session.filename,
      file_size: session.fileSize,
      mime_type: session.mimeType,
      status: session.status,
      created_at: session.createdAt.toISOString(),
      expires_at: session.expiresAt.toISOString(),
    };
  }

  private expireIfDue(session: DownloadSession, now = new Date()): boolean {
    if (session.status === 'active' && now > session.expiresAt) {
      session.status = 'expired';
      logger.info({ token: session.token }, 'Download session expired');
      return true;
    }
    return false;
  }

  private async releaseGroupIfDone(groupId: string): Promise<void> {
    const group = this.groups.get(groupId);
    if (!group) return;

    const stillActive = group.tokens.some((t) => this.sessions.get(t)?.status === 'active');
    if (stillActive) return;

    this.groups.delete(groupId);
    await group.storage.release();
  }

  private releaseGroupInBackground(groupId: string): void {
    this.releaseGroupIfDone(groupId).catch((error: unknown) => {
      logger.error({ groupId, error: errorMessage(error) }, 'Failed to release artifact storage');
    });
  }

  /**
   * Expires due sessions, releases storage nobody can download any more and forgets
   * finished sessions older than the retention window.
   */
  async sweep(now = new Date()): Promise<void> {
    const cutoff = new Date(now.getTime() - RETENTION_MS);
    const due = new Set<string>();
    let removed = 0;

    for (const [token, session] of this.sessions.entries()) {
      if (this.expireIfDue(session, now)) due.add(session.groupId);

      if (session.status !== 'active' && session.createdAt < cutoff) {
        this.sessions.delete(token);
        removed++;
      }
    }

    for (const groupId of due) {
      await this.releaseGroupIfDone(groupId);
    }

    if (removed > 0) {
      logger.info({ removed, remaining: this.sessions.size }, 'Download session cleanup');
    }
  }

  /** Stops the cleanup timer and removes every storage still held. Call on server shutdown. */
  async dispose(): Promise<void> {
    clearInterval(this.cleanupTimer);
    const groups = [...this.groups.values()];
    this.groups.clear();
    await Promise.all(groups.map((g) => g.storage.release()));
  }
}
