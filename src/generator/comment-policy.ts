/**
 * Write policy for extended comments
 *
 * An update of a merge view's comment column lands in the extended table
 * according to two facts: whether an extended row already exists for the key,
 * and whether the new value is null. The same table drives the generated
 * trigger body and applyCommentWrite().
 */

export type CommentWriteAction = 'insert' | 'noop' | 'delete' | 'update';

export type CommentWritePolicy = Readonly<
  Record<'absent' | 'present', Readonly<Record<'null' | 'value', CommentWriteAction>>>
>;

export const COMMENT_WRITE_POLICY: CommentWritePolicy = {
  absent: { null: 'noop', value: 'insert' },
  present: { null: 'delete', value: 'update' },
};

/**
 * Empty text carries no information in the native catalog either, so it is
 * treated exactly like null.
 */
export function isBlankComment(value: string | null | undefined): value is null | undefined | '' {
  return value === null || value === undefined || value === '';
}

export function resolveCommentWrite(rowExists: boolean, newValue: string | null): CommentWriteAction {
  const row = rowExists ? COMMENT_WRITE_POLICY.present : COMMENT_WRITE_POLICY.absent;
  return isBlankComment(newValue) ? row.null : row.value;
}

export type CommentKey = Record<string, string | number>;

/**
 * Backing store of one extended-comment table
 */
export interface ExtendedCommentStore {
  exists(key: CommentKey): Promise<boolean>;
  insert(key: CommentKey, comment: string): Promise<void>;
  update(key: CommentKey, comment: string): Promise<void>;
  delete(key: CommentKey): Promise<void>;
}

export async function applyCommentWrite(
  store: ExtendedCommentStore,
  key: CommentKey,
  newValue: string | null
): Promise<CommentWriteAction> {
  const action = resolveCommentWrite(await store.exists(key), newValue);

  switch (action) {
    case 'insert':
      await store.insert(key, newValue ?? '');
      break;
    case 'update':
      await store.update(key, newValue ?? '');
      break;
    case 'delete':
      await store.delete(key);
      break;
    case 'noop':
      break;
  }

  return action;
}
