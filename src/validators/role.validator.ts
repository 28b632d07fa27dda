/**
 * Role Parser
 */

import type { FieldCheck, UserRole } from '../types/index.js';
import { USER_ROLES, isUserRole, reject, success } from '../types/index.js';

export function parseRole(value: string): FieldCheck<UserRole> {
  if (!isUserRole(value)) {
    return reject(
      `Unrecognized role "${value}". Expected one of: ${USER_ROLES.join(', ')}.`,
      'UNRECOGNIZED_ROLE'
    );
  }
  return success(value);
}
