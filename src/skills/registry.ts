/**
 * Default skill registry.
 *
 * @module skills/registry
 */

import {
  checkWeatherSkill,
  createOpenAppSkill,
  createPlayMediaSkill,
  createSearchWebSkill,
  createTimeSkill,
} from './basic-skills.js';
import { createQueryFileSkill } from './query-file.js';
import type { Skill, SkillDeps, SkillRegistry } from './types.js';

/**
 * Build the registry for the bundled catalog's intents.
 */
export function createDefaultSkillRegistry(deps: SkillDeps): SkillRegistry {
  return new Map<string, Skill>([
    ['getTime', createTimeSkill(deps.now)],
    ['openApp', createOpenAppSkill(deps.openUrl)],
    ['searchWeb', createSearchWebSkill(deps.openUrl)],
    ['checkWeather', checkWeatherSkill],
    ['playMedia', createPlayMediaSkill(deps.openUrl)],
    ['queryFile', createQueryFileSkill(deps.queryFile, deps.completion)],
  ]);
}
