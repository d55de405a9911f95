import path from 'node:path';

import type { SettingsEditor } from '@/reposync/config';
import { AsyncQueue } from '@/reposync/lib/async-queue';
import { errorMessage } from '@/reposync/lib/errors';
import { createLogger, type Logger } from '@/reposync/lib/logger';
import type { AppEvent, Command } from '@/reposync/messages';
import {
  runTemplateSyncJob,
  TEMPLATE_JOB_QUEUE_CAPACITY,
  type TemplateJobMessage,
} from '@/reposync/template-job';
import type {
  FileConflictAction,
  GitHubAccountAdapter,
  RepositorySourceAdapter,
  SyncOrigin,
  TemplateSource,
  TemplateSourceAdapter,
  TreeNode,
} from '@/reposync/types';

export interface CommandExecutor {
  execute(command: Command): Promise<AppEvent | undefined>;
}

export type RecentStore = {
  addRecentTemplate: (entry: string) => Promise<string[]>;
  addRecentOwner: (owner: string) => Promise<string[]>;
};

export type EffectDependencies = {
  account: GitHubAccountAdapter;
  repositories: Record<SyncOrigin, RepositorySourceAdapter>;
  templates: TemplateSourceAdapter;
  recents: RecentStore;
  settings: SettingsEditor;
  /** Turns user-typed local paths into absolute ones. */
  resolvePath?: (value: string) => string;
  logger?: Logger;
};

type RunningJob = {
  outbox: AsyncQueue<TemplateJobMessage>;
  decisions: AsyncQueue<FileConflictAction>;
};

/**
 * Resolves workflow commands against the adapters. Every command settles
 * into at most one event; template jobs keep their queues here between
 * `awaitTemplateJobMessage` commands.
 */
export class EffectRunner implements CommandExecutor {
  private readonly jobs = new Map<number, RunningJob>();
  private readonly logger: Logger;
  private readonly resolvePath: (value: string) => string;

  constructor(private readonly deps: EffectDependencies) {
    this.logger = deps.logger ?? createLogger('[effects] ');
    this.resolvePath = deps.resolvePath ?? ((value) => path.resolve(value));
  }

  get runningJobs(): number {
    return this.jobs.size;
  }

  async execute(command: Command): Promise<AppEvent | undefined> {
    this.logger.debug(`command ${command.kind}`);

    switch (command.kind) {
      case 'loadOrganizations':
        try {
          return { type: 'organizationsLoaded', orgs: await this.deps.account.listOrganizations() };
        } catch (error) {
          return { type: 'organizationsFailed', message: errorMessage(error) };
        }

      case 'loadRepositories': {
        const adapter = this.deps.repositories[command.scope.kind === 'local' ? 'local' : 'github'];
        try {
          const items = await adapter.listRepositories(command.scope);
          return { type: 'repositoriesLoaded', requestId: command.requestId, items };
        } catch (error) {
          return { type: 'repositoriesFailed', requestId: command.requestId, message: errorMessage(error) };
        }
      }

      case 'loadTemplateTargets': {
        const items = await this.deps.repositories.local.listRepositories({
          kind: 'local',
          paths: command.paths,
        });
        return {
          type: 'templateTargetsLoaded',
          requestId: command.requestId,
          paths: items.map((item) => item.id),
        };
      }

      case 'probeDestination':
        try {
          const exists = await this.deps.repositories[command.origin].exists(command.destination);
          return { type: 'destinationProbed', runId: command.runId, index: command.index, exists };
        } catch (error) {
          return {
            type: 'itemFinished',
            runId: command.runId,
            index: command.index,
            result: { repo: path.basename(command.destination), success: false, error: errorMessage(error) },
          };
        }

      case 'cloneOrCopy':
        try {
          await this.deps.repositories[command.origin].cloneOrCopy(command.identifier, command.targetDir);
          return {
            type: 'itemFinished',
            runId: command.runId,
            index: command.index,
            result: { repo: command.repoName, success: true },
          };
        } catch (error) {
          this.logger.warn(`sync of ${command.identifier} failed: ${errorMessage(error)}`);
          return {
            type: 'itemFinished',
            runId: command.runId,
            index: command.index,
            result: { repo: command.repoName, success: false, error: errorMessage(error) },
          };
        }

      case 'refreshRepository':
        try {
          await this.deps.repositories[command.origin].refresh(command.destination);
          return {
            type: 'itemFinished',
            runId: command.runId,
            index: command.index,
            result: { repo: command.repoName, success: true },
          };
        } catch (error) {
          this.logger.warn(`refresh of ${command.destination} failed: ${errorMessage(error)}`);
          return {
            type: 'itemFinished',
            runId: command.runId,
            index: command.index,
            result: { repo: command.repoName, success: false, error: errorMessage(error) },
          };
        }

      case 'completeSync': {
        const failed = command.results.filter((result) => !result.success).length;
        this.logger.info(`sync run ${command.runId} finished: ${command.results.length} items, ${failed} failed`);
        return { type: 'syncCompleted', runId: command.runId, results: command.results };
      }

      case 'resolveTemplateTree':
        try {
          const { source, root } = await this.resolveTemplateTree(command.source);
          return { type: 'templateTreeResolved', requestId: command.requestId, source, root };
        } catch (error) {
          return { type: 'templateTreeFailed', requestId: command.requestId, message: errorMessage(error) };
        }

      case 'recordRecentTemplate':
        return {
          type: 'recentTemplatesUpdated',
          entries: await this.deps.recents.addRecentTemplate(command.entry),
        };

      case 'recordRecentOwner':
        return {
          type: 'recentOwnersUpdated',
          entries: await this.deps.recents.addRecentOwner(command.owner),
        };

      case 'loadSettings':
        try {
          const { values, filePath } = await this.deps.settings.read();
          return { type: 'settingsLoaded', values, filePath };
        } catch (error) {
          return { type: 'settingsFailed', message: errorMessage(error) };
        }

      case 'saveSettings':
        try {
          const saved = await this.deps.settings.save(command.values);
          this.logger.info(`settings saved to ${saved.filePath}`);
          return { type: 'settingsSaved', ...saved };
        } catch (error) {
          return { type: 'settingsFailed', message: errorMessage(error) };
        }

      case 'startTemplateJob':
        this.startTemplateJob(command);
        return undefined;

      case 'awaitTemplateJobMessage':
        return this.awaitTemplateJobMessage(command.jobId);

      case 'resolveFileConflict': {
        const job = this.jobs.get(command.jobId);
        if (!job) {
          this.logger.warn(`conflict decision for unknown job ${command.jobId}`);
          return undefined;
        }
        await job.decisions.push(command.action);
        return undefined;
      }

      case 'exit':
        for (const job of this.jobs.values()) {
          job.decisions.close();
        }
        return undefined;
    }
  }

  private async resolveTemplateTree(
    source: TemplateSource,
  ): Promise<{ source: TemplateSource; root: TreeNode }> {
    if (source.kind === 'local') {
      const resolved = this.resolvePath(source.path);
      return {
        source: { kind: 'local', path: resolved },
        root: await this.deps.templates.walkLocalDirectory(resolved),
      };
    }

    const branch =
      source.branch ?? (await this.deps.templates.resolveDefaultBranch(source.owner, source.repo));
    return {
      source: { ...source, branch },
      root: await this.deps.templates.fetchTree(source.owner, source.repo, branch),
    };
  }

  private startTemplateJob(command: Extract<Command, { kind: 'startTemplateJob' }>): void {
    const job: RunningJob = {
      outbox: new AsyncQueue<TemplateJobMessage>(TEMPLATE_JOB_QUEUE_CAPACITY),
      decisions: new AsyncQueue<FileConflictAction>(1),
    };
    this.jobs.set(command.jobId, job);
    this.logger.info(
      `template job ${command.jobId}: ${command.files.length} files into ${command.targets.length} targets`,
    );

    void runTemplateSyncJob({
      source: command.source,
      files: command.files,
      targets: command.targets,
      templates: this.deps.templates,
      outbox: job.outbox,
      decisions: job.decisions,
      logger: this.logger,
    }).catch((error: unknown) => {
      this.logger.error(`template job ${command.jobId} failed: ${errorMessage(error)}`);
    });
  }

  private async awaitTemplateJobMessage(jobId: number): Promise<AppEvent> {
    const job = this.jobs.get(jobId);
    if (!job) {
      return { type: 'templateJobClosed', jobId };
    }

    const next = await job.outbox.next();
    if (next.done) {
      job.decisions.close();
      this.jobs.delete(jobId);
      return { type: 'templateJobClosed', jobId };
    }

    const message = next.value;
    switch (message.type) {
      case 'progress':
        return { type: 'templateProgress', jobId, progress: message.progress };
      case 'conflict':
        return {
          type: 'templateFileConflict',
          jobId,
          filePath: message.filePath,
          targetRepo: message.targetRepo,
        };
      case 'summary':
        return { type: 'templateSyncCompleted', jobId, summary: message.summary };
    }
  }
}
