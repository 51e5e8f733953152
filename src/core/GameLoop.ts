/**
 * Schedules the next frame. Browsers hand this to requestAnimationFrame; in Node the default
 * below falls back to timers.
 */
export interface FrameScheduler {
    request(cb: (nowMs: number) => void): number;
    cancel(handle: number): void;
}

export const timerScheduler: FrameScheduler = (() => {
    const handles = new Map<number, ReturnType<typeof setTimeout>>();
    let nextHandle = 1;
    return {
        request(cb: (nowMs: number) => void): number {
            const handle = nextHandle++;
            handles.set(handle, setTimeout(() => {
                handles.delete(handle);
                cb(performance.now());
            }, 16));
            return handle;
        },
        cancel(handle: number): void {
            const timer = handles.get(handle);
            if (timer !== undefined) clearTimeout(timer);
            handles.delete(handle);
        },
    };
})();

export interface GameLoopOptions {
    /** Logic ticks per second (default 60). */
    fixedHz?: number;
    /** Max logic ticks processed for a single frame before backlog is dropped. */
    maxCatchUpFrames?: number;
    scheduler?: FrameScheduler;
}

/**
 * Represents the main game loop, handling updates and rendering with a fixed timestep.
 * One logic tick mutates the simulation; control then goes back to the host to render and
 * poll input. Nothing inside a tick blocks.
 */
export class GameLoop {
    private lastTime = 0;
    private accumulatedTime = 0;
    /** Fixed update interval in ms (logic tick). */
    private readonly fixedUpdateInterval: number;
    private readonly maxCatchUpFrames: number;
    private readonly scheduler: FrameScheduler;
    /** Update callback receives fixed delta (ms). */
    private update: (deltaMs: number) => void;
    /** Render callback receives interpolation alpha (0..1). */
    private render: (alpha: number) => void;
    private frameHandle: number | null = null;
    private loopBound: (ts: number) => void; // cached bound function to avoid per-frame bind alloc
    private maxDeltaClamp = 1000; // clamp huge tab-switch spikes

    constructor(updateCallback: (deltaMs: number) => void, renderCallback: (alpha: number) => void, opts?: GameLoopOptions) {
        this.update = updateCallback;
        this.render = renderCallback;
        const hz = opts?.fixedHz && opts.fixedHz > 0 ? opts.fixedHz : 60;
        this.fixedUpdateInterval = 1000 / hz;
        this.maxCatchUpFrames = opts?.maxCatchUpFrames ?? 5;
        this.scheduler = opts?.scheduler ?? timerScheduler;
        this.loopBound = this.loop.bind(this);
    }

    public get fixedDeltaMs(): number {
        return this.fixedUpdateInterval;
    }

    public isRunning(): boolean {
        return this.frameHandle !== null;
    }

    public start(): void {
        if (this.frameHandle !== null) return; // already running
        this.frameHandle = this.scheduler.request(this.loopBound);
    }

    public stop(): void {
        if (this.frameHandle !== null) {
            this.scheduler.cancel(this.frameHandle);
            this.frameHandle = null;
        }
    }

    /**
     * Reset internal timers so that after a manual pause or tab switch we don't process a huge delta.
     */
    public resetTiming(): void {
        this.lastTime = 0;
        this.accumulatedTime = 0;
    }

    /**
     * Advances the loop to `currentTime` without scheduling another frame. Returns the number of
     * logic ticks that ran.
     */
    public tick(currentTime: number): number {
        if (this.lastTime === 0) this.lastTime = currentTime;
        let deltaMs = currentTime - this.lastTime;
        this.lastTime = currentTime;
        if (deltaMs < 0) deltaMs = 0;
        if (deltaMs > this.maxDeltaClamp) deltaMs = this.fixedUpdateInterval; // huge spike -> treat as single tick

        this.accumulatedTime += deltaMs;
        const cap = this.fixedUpdateInterval * this.maxCatchUpFrames;
        if (this.accumulatedTime > cap) this.accumulatedTime = cap; // drop excess backlog
        let ticks = 0;
        while (this.accumulatedTime >= this.fixedUpdateInterval) {
            this.update(this.fixedUpdateInterval);
            this.accumulatedTime -= this.fixedUpdateInterval;
            ticks++;
        }
        this.render(this.accumulatedTime / this.fixedUpdateInterval);
        return ticks;
    }

    private loop(currentTime: number): void {
        this.tick(currentTime);
        if (this.frameHandle !== null) {
            this.frameHandle = this.scheduler.request(this.loopBound);
        }
    }
}
