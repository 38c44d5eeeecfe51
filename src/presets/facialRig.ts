/**
 * Bundled rig configuration of a small face: head, eyes and teeth with
 * skin bindings, template clusters and lattices, a teeth wrap and a lip
 * transfer node.
 */

import { parseRigConfig } from '../rebuild/config/loader';
import type { RigConfig } from '../rebuild/config/types';
import facialRig from './facialRig.json';

export const DEFAULT_FACIAL_RIG: RigConfig = parseRigConfig(facialRig);
