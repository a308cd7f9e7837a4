/**
 * Instead-of-update trigger generation
 *
 * Makes the merge view writable for its comment column: each updated row is
 * routed to the extended table by COMMENT_WRITE_POLICY.
 */

import { CreateTriggerFunctionStatement, CreateTriggerStatement, qualified } from '../ddl/statements.js';
import { COMMENT_WRITE_POLICY } from './comment-policy.js';
import type { MergeViewSpec } from './merge-view.js';

export interface SyncTrigger {
  fn: CreateTriggerFunctionStatement;
  trigger: CreateTriggerStatement;
}

export function syncTriggerName(relation: string): string {
  return `${relation}_update`;
}

export function generateSyncTrigger(spec: MergeViewSpec): SyncTrigger {
  const name = syncTriggerName(spec.relation);
  const fnName = qualified(spec.view.schema, name);

  return {
    fn: {
      type: 'create_trigger_function',
      name: fnName,
      target: spec.extended,
      keys: spec.keys,
      carried: spec.carried,
      commentColumn: spec.commentColumn,
      policy: COMMENT_WRITE_POLICY,
    },
    trigger: {
      type: 'create_trigger',
      name,
      on: spec.view,
      fn: fnName,
    },
  };
}
