import { render } from 'ink';

import type { WorkflowController } from '@/reposync/controller';
import { RepoSyncApplication } from '@/reposync/ui/reposync.application';

export const runRepoSyncApplication = async (controller: WorkflowController): Promise<number> => {
  const { waitUntilExit } = render(<RepoSyncApplication controller={controller} />);

  controller.start();
  await waitUntilExit();

  const { queue, template } = controller.getState();
  const failed =
    (queue?.results.some((result) => !result.success) ?? false) || template.summary.errors > 0;
  return failed ? 1 : 0;
};
