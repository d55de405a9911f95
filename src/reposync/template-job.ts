import { chmod, mkdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { AsyncQueue } from '@/reposync/lib/async-queue';
import { errorMessage } from '@/reposync/lib/errors';
import { pathExists, resolveWithin } from '@/reposync/lib/fs';
import { silentLogger, type Logger } from '@/reposync/lib/logger';
import type {
  FileConflictAction,
  TemplateFileResult,
  TemplateSource,
  TemplateSourceAdapter,
  TemplateSyncProgress,
  TemplateSyncSummary,
} from '@/reposync/types';

export const TEMPLATE_JOB_QUEUE_CAPACITY = 100;

export type TemplateJobMessage =
  | { type: 'progress'; progress: TemplateSyncProgress }
  | { type: 'conflict'; filePath: string; targetRepo: string }
  | { type: 'summary'; summary: TemplateSyncSummary };

/** Local template files keep their permission bits in every target. */
type TemplateFile = {
  content: Uint8Array;
  mode?: number;
};

export type TemplateJobOptions = {
  source: TemplateSource;
  files: string[];
  targets: string[];
  templates: Pick<TemplateSourceAdapter, 'readFile'>;
  outbox: AsyncQueue<TemplateJobMessage>;
  decisions: AsyncQueue<FileConflictAction>;
  logger?: Logger;
};

/**
 * Copies every selected file into every target, targets outer and files
 * inner. A progress record follows each file operation, conflicts are asked
 * through the outbox and answered through `decisions`, and a summary record
 * ends the stream before the outbox is closed.
 */
export const runTemplateSyncJob = async (options: TemplateJobOptions): Promise<TemplateSyncSummary> => {
  const { source, files, targets, templates, outbox, decisions } = options;
  const logger = options.logger ?? silentLogger;

  const total = files.length * targets.length;
  const summary: TemplateSyncSummary = { synced: 0, skipped: 0, errors: 0 };
  const contents = new Map<string, Promise<TemplateFile>>();
  let overwriteAll = false;
  let skipAll = false;
  let current = 0;

  const loadTemplateFile = async (filePath: string): Promise<TemplateFile> => {
    const content = await templates.readFile(source, filePath);
    if (source.kind !== 'local') {
      return { content };
    }
    const stats = await stat(resolveWithin(source.path, filePath));
    return { content, mode: stats.mode & 0o777 };
  };

  const readTemplateFile = (filePath: string): Promise<TemplateFile> => {
    const cached = contents.get(filePath);
    if (cached) {
      return cached;
    }
    const pending = loadTemplateFile(filePath);
    contents.set(filePath, pending);
    return pending;
  };

  const shouldWrite = async (filePath: string, targetRepo: string): Promise<boolean> => {
    if (skipAll) {
      return false;
    }
    if (overwriteAll) {
      return true;
    }

    await outbox.push({ type: 'conflict', filePath, targetRepo });
    const decision = await decisions.next();
    const action: FileConflictAction = decision.done ? 'skip' : decision.value;

    overwriteAll = overwriteAll || action === 'overwriteAll';
    skipAll = skipAll || action === 'skipAll';
    return action === 'overwrite' || action === 'overwriteAll';
  };

  const syncFile = async (filePath: string, targetRepo: string): Promise<TemplateFileResult> => {
    try {
      const destination = resolveWithin(targetRepo, filePath);

      if ((await pathExists(destination)) && !(await shouldWrite(filePath, targetRepo))) {
        return { filePath, targetRepo, success: true, skipped: true };
      }

      const { content, mode } = await readTemplateFile(filePath);
      await mkdir(path.dirname(destination), { recursive: true });
      await writeFile(destination, content);
      if (mode !== undefined) {
        await chmod(destination, mode);
      }
      return { filePath, targetRepo, success: true, skipped: false };
    } catch (error) {
      logger.warn(`template sync: ${filePath} -> ${targetRepo} failed: ${errorMessage(error)}`);
      return { filePath, targetRepo, success: false, skipped: false, error: errorMessage(error) };
    }
  };

  try {
    for (const targetRepo of targets) {
      for (const filePath of files) {
        const result = await syncFile(filePath, targetRepo);

        if (!result.success) {
          summary.errors += 1;
        } else if (result.skipped) {
          summary.skipped += 1;
        } else {
          summary.synced += 1;
        }

        current += 1;
        await outbox.push({
          type: 'progress',
          progress: { current, total, currentFile: filePath, currentTarget: targetRepo },
        });
      }
    }

    await outbox.push({ type: 'summary', summary: { ...summary } });
    logger.info(
      `template sync finished: ${summary.synced} synced, ${summary.skipped} skipped, ${summary.errors} errors`,
    );
    return summary;
  } finally {
    outbox.close();
  }
};
