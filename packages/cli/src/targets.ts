import { CORE_EMITTERS, type Emitter } from '@metacodec/core';
import { DOCS_EMITTERS } from '@metacodec/docs';

import type { Target } from './flags.js';

export const EMITTERS: Record<Target, Emitter> = {
  ...CORE_EMITTERS,
  ...DOCS_EMITTERS,
};
