import { describe, it, expect, vi, afterEach } from "vitest";
import { runLife, textPainter, type FrameScheduler } from "../life/life";
import { Universe } from "../life/universe";

// ---------------------------------------------------------------------------
// Manual frame scheduler
// ---------------------------------------------------------------------------

function manualFrames() {
  const pending = new Map<number, () => void>();
  let nextHandle = 1;

  const frames: FrameScheduler = {
    request: (callback) => {
      const handle = nextHandle++;
      pending.set(handle, callback);
      return handle;
    },
    cancel: (handle) => {
      pending.delete(handle);
    },
  };

  return {
    frames,
    pending,
    step() {
      const callbacks = [...pending.values()];
      pending.clear();
      for (const callback of callbacks) callback();
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

describe("runLife", () => {
  it("waits for the first frame before painting", () => {
    const { frames, pending } = manualFrames();
    const paint = vi.fn();

    runLife(new Universe({ width: 4, height: 4 }), paint, frames);

    expect(paint).not.toHaveBeenCalled();
    expect(pending.size).toBe(1);
  });

  it("paints then ticks on every frame", () => {
    const { frames, step } = manualFrames();
    const universe = new Universe({ width: 4, height: 4 });
    const painted: number[] = [];

    runLife(universe, (u) => painted.push(u.generation), frames);
    step();
    step();
    step();

    expect(painted).toEqual([0, 1, 2]);
    expect(universe.generation).toBe(3);
  });

  it("stops after cancel", () => {
    const { frames, pending, step } = manualFrames();
    const universe = new Universe({ width: 4, height: 4 });
    const paint = vi.fn();

    const animation = runLife(universe, paint, frames);
    step();
    animation.cancel();
    step();

    expect(paint).toHaveBeenCalledTimes(1);
    expect(pending.size).toBe(0);
    expect(universe.generation).toBe(1);
  });

  it("stops without ticking when the painter cancels", () => {
    const { frames, pending, step } = manualFrames();
    const universe = new Universe({ width: 4, height: 4 });
    let painted = 0;

    const animation = runLife(
      universe,
      () => {
        painted++;
        animation.cancel();
      },
      frames,
    );
    step();
    step();

    expect(painted).toBe(1);
    expect(universe.generation).toBe(0);
    expect(pending.size).toBe(0);
  });

  it("logs and stops when the painter throws", () => {
    const { frames, pending, step } = manualFrames();
    const universe = new Universe({ width: 4, height: 4 });
    const error = new Error("boom");
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

    runLife(
      universe,
      () => {
        throw error;
      },
      frames,
    );
    step();

    expect(consoleError).toHaveBeenCalledWith("Life loop stopped", error);
    expect(pending.size).toBe(0);
    expect(universe.generation).toBe(0);
  });

  it("uses animation frames by default", () => {
    const request = vi.fn(() => 7);
    const cancel = vi.fn();
    vi.stubGlobal("requestAnimationFrame", request);
    vi.stubGlobal("cancelAnimationFrame", cancel);

    const animation = runLife(new Universe({ width: 2, height: 2 }), vi.fn());
    animation.cancel();

    expect(request).toHaveBeenCalledTimes(1);
    expect(cancel).toHaveBeenCalledWith(7);
  });
});

describe("textPainter", () => {
  it("writes the rendered grid into the target", () => {
    const { frames, step } = manualFrames();
    const target: { textContent: string | null } = { textContent: null };

    runLife(new Universe({ width: 3, height: 2 }), textPainter(target), frames);
    step();

    expect(target.textContent).toBe("◼◻◼\n◻◼◻");
  });
});
