/**
 * Argument Router
 *
 * Splits argv into orchestration flags and pass-through arguments in a
 * single left-to-right pass.
 */

import type { FlagTable, InvocationRequest } from './types';
import { createDraftRequest } from './types';
import type { RouterError } from '../types/router-error';
import { missingFlagValue } from '../types/router-error';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';

/**
 * Look up a token in the flag table. Only own keys count, so tokens such as
 * `constructor` or `toString` are never mistaken for flags.
 */
function lookupFlag(table: FlagTable, token: string) {
  return Object.prototype.hasOwnProperty.call(table, token) ? table[token] : undefined;
}

/**
 * Route raw arguments (without the node and script path) through a flag table.
 *
 * A value flag consumes the next token whatever it looks like; a value flag
 * in last position is a MissingFlagValue error. Every other token is
 * forwarded, in order.
 */
export function routeArgs(tokens: readonly string[], table: FlagTable): Result<InvocationRequest, RouterError> {
  const draft = createDraftRequest();

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const spec = lookupFlag(table, token);

    if (!spec) {
      draft.passthroughArgs.push(token);
      continue;
    }

    if (spec.takesValue) {
      if (i + 1 >= tokens.length) {
        return err(missingFlagValue(token));
      }
      spec.apply(draft, tokens[i + 1]);
      i += 1;
    } else {
      spec.apply(draft);
    }
  }

  return ok(
    Object.freeze({
      ...draft,
      mode: Object.freeze({ ...draft.mode }),
      passthroughArgs: Object.freeze([...draft.passthroughArgs]),
    })
  );
}
