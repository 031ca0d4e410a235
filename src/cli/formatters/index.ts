export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export type { IFormatter } from './types.js';

import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { IFormatter } from './types.js';

export function createFormatter(json: boolean | undefined): IFormatter {
  return json ? new JsonFormatter() : new HumanFormatter();
}
