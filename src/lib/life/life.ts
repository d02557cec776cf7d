import type { Universe } from "./universe";

export interface LifeAnimation {
  cancel: () => void;
}

export type LifePainter = (universe: Universe) => void;

export interface FrameScheduler {
  request: (callback: () => void) => number;
  cancel: (handle: number) => void;
}

export const animationFrames: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (handle) => cancelAnimationFrame(handle),
};

export function textPainter(target: { textContent: string | null }) {
  return (universe: Universe) => {
    target.textContent = universe.render();
  };
}

/**
 * Paints the universe then advances it, once per frame, until cancelled.
 * A throwing painter stops the loop.
 */
export function runLife(
  universe: Universe,
  paint: LifePainter,
  frames: FrameScheduler = animationFrames,
): LifeAnimation {
  let animationFrameId: number | null = null;
  let isCancelled = false;

  function frame() {
    animationFrameId = null;
    if (isCancelled) return;

    try {
      paint(universe);
      // The painter may cancel
      if (isCancelled) return;
      universe.tick();
    } catch (e) {
      console.error("Life loop stopped", e);
      isCancelled = true;
      return;
    }

    if (isCancelled) return;
    animationFrameId = frames.request(frame);
  }

  animationFrameId = frames.request(frame);

  return {
    cancel: () => {
      isCancelled = true;
      if (animationFrameId !== null) frames.cancel(animationFrameId);
      animationFrameId = null;
    },
  };
}
