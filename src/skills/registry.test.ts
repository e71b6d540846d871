import { describe, it, expect, vi } from 'vitest';
import { createDefaultSkillRegistry } from './registry.js';
import { SkillDispatcher } from './dispatcher.js';
import { loadCatalog, BUNDLED_CATALOG_PATH } from '../catalog/catalog-loader.js';
import { classify } from '../intent/intent-classifier.js';
import type { SkillDeps, UrlOpener } from './types.js';

function createDeps(): SkillDeps {
  return {
    openUrl: vi.fn<UrlOpener>().mockResolvedValue(undefined),
    now: () => new Date(2024, 2, 10, 8, 15),
    queryFile: { allowedExtensions: ['.txt'], maxPromptChars: 15000 },
    completion: null,
  };
}

describe('createDefaultSkillRegistry', () => {
  it('registers a skill for every bundled intent', async () => {
    const registry = createDefaultSkillRegistry(createDeps());
    const catalog = await loadCatalog(BUNDLED_CATALOG_PATH, 75);
    expect([...registry.keys()].sort()).toEqual([...catalog.names()].sort());
  });

  it('answers classified utterances end to end', async () => {
    const deps = createDeps();
    const dispatcher = new SkillDispatcher(createDefaultSkillRegistry(deps));
    const catalog = await loadCatalog(BUNDLED_CATALOG_PATH, 75);

    expect((await dispatcher.dispatch(classify(catalog, 'what time is it'))).reply).toBe(
      'The current time is 08:15 AM.',
    );
    expect((await dispatcher.dispatch(classify(catalog, 'jarvis open youtube'))).reply).toBe('Opening YouTube...');
    expect((await dispatcher.dispatch(classify(catalog, 'search for cats'))).reply).toBe(
      "Searching the web for 'cats'...",
    );
    expect(deps.openUrl).toHaveBeenLastCalledWith('https://www.google.com/search?q=cats');
    expect((await dispatcher.dispatch(classify(catalog, 'gibberish words here'))).reply).toBe(
      "Sorry, I didn't understand that.",
    );
  });
});
