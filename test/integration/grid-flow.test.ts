import { describe, it, expect, afterEach } from 'vitest';
import { RecordingBackend } from '../../src/capabilities/recording.js';
import { VoxConfigSchema } from '../../src/core/types.js';
import type { ElementSource } from '../../src/overlays/types.js';
import { createRuntime, type VoxRuntime } from '../../src/pipeline/runtime.js';

describe('voice-driven pointer flow', () => {
  let runtime: VoxRuntime | null = null;

  afterEach(async () => {
    await runtime?.dispose();
    runtime = null;
  });

  function start(elementSource?: ElementSource): { runtime: VoxRuntime; backend: RecordingBackend } {
    const config = VoxConfigSchema.parse({});
    const backend = new RecordingBackend(config.screen);
    const created = createRuntime(config, {
      keyboard: backend.keyboard,
      mouse: backend.mouse,
      system: backend.system,
      elementSource,
    });
    runtime = created;
    return { runtime: created, backend };
  }

  async function say(target: VoxRuntime, utterance: string): Promise<void> {
    target.session.processText(utterance);
    await target.flush();
  }

  it('should reach a refined cell in three utterances', async () => {
    const { runtime: rt, backend } = start();

    await say(rt, 'grid');
    await say(rt, 'refine 45');
    await say(rt, '5');

    expect(backend.describe()).toEqual(['move 1813,540']);
    expect(rt.overlays.getMetadata('refinedCell')).toBe(45);
  });

  it('should run utterances in arrival order before anything is drawn', async () => {
    const { runtime: rt, backend } = start();

    rt.session.processText('grid');
    rt.session.processText('refine 45');
    rt.session.processText('5');

    expect(backend.describe()).toEqual(['move 1813,540']);
    await rt.flush();
    expect(rt.overlays.getMetadata('refinedCell')).toBe(45);
  });

  it('should report a back-to-back refine outside the refined grid as failed', async () => {
    const { runtime: rt } = start();
    const refines: unknown[] = [];
    rt.events.subscribe('command:action', (event) => {
      if (event.data.command === 'RefineGridCommand') refines.push(event.data.refined);
    });

    rt.session.processText('grid');
    rt.session.processText('refine 5');
    rt.session.processText('refine 45');
    await rt.flush();

    expect(refines).toEqual([true, false]);
    expect(rt.overlays.getMetadata('refinedCell')).toBe(5);
  });

  it('should not address cells of the parent grid after refining', async () => {
    const { runtime: rt, backend } = start();

    await say(rt, 'grid');
    await say(rt, 'refine 45');
    await say(rt, 'click 45');

    expect(backend.actions).toHaveLength(0);
  });

  it('should ignore bare numbers with no overlay up', async () => {
    const { runtime: rt, backend } = start();

    await say(rt, '5');

    expect(backend.actions).toHaveLength(0);
  });

  it('should click detected elements by number', async () => {
    const { runtime: rt, backend } = start({
      detect: () => [{ bounds: { x: 100, y: 100, width: 40, height: 20 }, name: 'OK' }],
    });

    await say(rt, 'numbers');
    await say(rt, 'click one');

    expect(backend.describe()).toEqual(['move 120,110', 'click left x1']);
  });

  it('should drag between grid cells', async () => {
    const { runtime: rt, backend } = start();

    await say(rt, 'grid');
    await say(rt, 'five to nine');

    expect(backend.describe()).toEqual(['move 960,60', 'mouse press left', 'move 1813,60', 'mouse release left']);
  });

  it('should open and close help by voice', async () => {
    const { runtime: rt } = start();

    await say(rt, 'help');
    expect(rt.overlays.isVisible('help')).toBe(true);

    await say(rt, 'close help');
    expect(rt.overlays.isAnyVisible()).toBe(false);
  });

  it('should hide the grid on a misheard "hide"', async () => {
    const { runtime: rt } = start();

    await say(rt, 'grid');
    await say(rt, 'height');

    expect(rt.overlays.isAnyVisible()).toBe(false);
  });
});
