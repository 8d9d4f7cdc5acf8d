import type { Logger } from '../logger/index.js';
import type { Session } from '../session/session.js';
import type { StepTree } from './types.js';

export interface FlatStep {
  id: string;
  type: string;
  name: string;
  status: string;
  depth: number;
  duration: number | null;
}

/** Writes the chain of thought of an ending session to the log, one entry per step. */
export class StepTreeExporter {
  constructor(private logger: Logger) {}

  exportSession(session: Session): void {
    const steps = session.tracker.roots().flatMap((root) => this.flattenTree(session.tracker.tree(root.id)));
    this.logger.info(
      {
        sessionId: session.id,
        duration: Date.now() - session.createdAt,
        messages: session.chatContext.length,
        steps,
      },
      'trace:export',
    );
  }

  flattenTree(tree: StepTree, depth = 0): FlatStep[] {
    const { step } = tree;
    const result: FlatStep[] = [
      {
        id: step.id,
        type: step.type,
        name: step.name,
        status: step.status,
        depth,
        duration: step.endedAt !== null ? step.endedAt - step.startedAt : null,
      },
    ];
    for (const child of tree.children) {
      result.push(...this.flattenTree(child, depth + 1));
    }
    return result;
  }
}
