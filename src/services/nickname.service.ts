/**
 * Nickname Resolver
 *
 * Supplies a nickname when the draft has none, by calling the nickname
 * generator exactly once. Generator failures surface as a COLLABORATOR_ERROR
 * on the nickname field - an empty nickname is never substituted.
 */

import type { FieldCheck } from '../types/index.js';
import { reject, success } from '../types/index.js';

/**
 * Nickname-generation collaborator
 * Expected to return a value that already satisfies the nickname rules
 */
export type NicknameGenerator = () => string;

export interface NicknameResolver {
  resolve(raw: string | undefined): FieldCheck<string>;
}

export function createNicknameResolver(deps: {
  generate: NicknameGenerator;
}): NicknameResolver {
  const { generate } = deps;

  return {
    resolve(raw: string | undefined): FieldCheck<string> {
      if (raw !== undefined && raw !== '') {
        return success(raw);
      }

      let generated: string;
      try {
        generated = generate();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return reject(
          `Nickname generation failed: ${reason}`,
          'COLLABORATOR_ERROR'
        );
      }

      if (generated === '') {
        return reject(
          'Nickname generator returned an empty value.',
          'COLLABORATOR_ERROR'
        );
      }
      return success(generated);
    },
  };
}
