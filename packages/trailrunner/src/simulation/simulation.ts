/**
 * Simulation - The context object that owns and wires every runtime
 * component.
 *
 * One instance is created per running game and passed by reference to modes
 * and states (as their `ModeHost`) and to the renderer (as its
 * `FrameSource`). Nothing in the runtime reaches it through a global.
 *
 * Wiring:
 * - Mode stack → `onModeChanged`
 * - Input router → the mode active at dispatch time, then `onCommandDispatched`
 * - Renderer → `onBufferChanged`
 */

import type { ILogObj, Logger } from "tslog";
import { InvariantViolation } from "../core/errors.js";
import { InputRouter } from "../input/input-router.js";
import { defaultLogger } from "../logging/logger.js";
import { ModeFactory } from "../modes/mode-factory.js";
import { ModeStack } from "../modes/mode-stack.js";
import { StateFactory } from "../modes/state-factory.js";
import type {
  Mode,
  ModeHost,
  ModeIdOf,
  ModeRegistry,
  SimulationTypes,
  State,
  StateIdOf,
} from "../modes/types.js";
import { type FrameSource, Renderer } from "../render/renderer.js";
import { Scheduler, type TickOptions, type TickResult } from "./scheduler.js";
import { TickClock } from "./tick-clock.js";

export interface SimulationCallbacks<T extends SimulationTypes> {
  onModeChanged?: (modeId: ModeIdOf<T>) => void;
  onBufferChanged?: (frame: string) => void;
  onInputBufferUpdated?: (buffer: string, added: string) => void;
  /** modeId is null when the command arrived while the stack was empty */
  onCommandDispatched?: (command: string, modeId: ModeIdOf<T> | null) => void;
}

export interface SimulationOptions<T extends SimulationTypes> {
  registry: ModeRegistry<T>;
  domain: T["domain"];
  /** @default 1000 */
  pulseIntervalMs?: number;
  now?: () => number;
  logger?: Logger<ILogObj>;
  callbacks?: SimulationCallbacks<T>;
}

export class Simulation<T extends SimulationTypes> implements ModeHost<T>, FrameSource<T> {
  readonly domain: T["domain"];
  readonly logger: Logger<ILogObj>;
  readonly modeFactory: ModeFactory<T>;
  readonly stateFactory: StateFactory<T>;
  readonly modes: ModeStack<T>;
  readonly input: InputRouter;
  readonly renderer: Renderer<T>;

  private readonly clock: TickClock;
  private readonly scheduler: Scheduler<T>;
  private readonly callbacks: SimulationCallbacks<T>;
  private turnCount = 0;
  private destroyed = false;

  /**
   * @throws UnregisteredModeError when the registry misses a declared mode
   */
  static create<T extends SimulationTypes>(options: SimulationOptions<T>): Simulation<T> {
    return new Simulation(options);
  }

  private constructor(options: SimulationOptions<T>) {
    this.domain = options.domain;
    this.logger = options.logger ?? defaultLogger;
    this.callbacks = options.callbacks ?? {};

    this.modeFactory = new ModeFactory(
      options.registry,
      this,
      this.logger.getSubLogger({ name: "mode-factory" }),
    );
    this.stateFactory = new StateFactory(
      options.registry,
      this,
      this.logger.getSubLogger({ name: "state-factory" }),
    );
    this.modes = new ModeStack(
      this.modeFactory,
      this.stateFactory,
      { onModeChanged: (modeId) => this.callbacks.onModeChanged?.(modeId) },
      this.logger.getSubLogger({ name: "mode-stack" }),
    );
    this.input = new InputRouter(
      this.modes,
      {
        onBufferUpdated: (buffer, added) => this.callbacks.onInputBufferUpdated?.(buffer, added),
        onCommand: (command) => this.dispatch(command),
      },
      this.logger.getSubLogger({ name: "input-router" }),
    );
    this.renderer = new Renderer(this, {
      onBufferChanged: (frame) => this.callbacks.onBufferChanged?.(frame),
    });
    this.clock = new TickClock({ pulseIntervalMs: options.pulseIntervalMs, now: options.now });
    this.scheduler = new Scheduler({
      clock: this.clock,
      domain: this.domain,
      modes: this.modes,
      input: this.input,
      renderer: this.renderer,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Adds the given modes in order; the last one ends up active.
   */
  start(initialModes: readonly ModeIdOf<T>[]): this {
    this.assertAlive();
    for (const modeId of initialModes) {
      this.modes.add(modeId);
    }
    return this;
  }

  tick(options?: TickOptions): TickResult {
    this.assertAlive();
    return this.scheduler.tick(options);
  }

  /**
   * Tears every component down. The instance cannot be ticked afterwards.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    this.modes.destroy();
    this.input.destroy();
    this.renderer.destroy();
    this.modeFactory.destroy();
    this.stateFactory.destroy();
    this.clock.reset();
    this.turnCount = 0;
    this.logger.debug("Simulation destroyed");
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // ModeHost
  // ─────────────────────────────────────────────────────────────────────────────

  get turns(): number {
    return this.turnCount;
  }

  takeTurn(): void {
    this.turnCount++;
    this.domain.onTurn?.(this.turnCount);
  }

  addMode(modeId: ModeIdOf<T>): void {
    this.modes.add(modeId);
  }

  createState(stateId: StateIdOf<T>, owner: Mode<T>): State<T> {
    return this.stateFactory.createState(stateId, owner.modeId, owner);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // FrameSource
  // ─────────────────────────────────────────────────────────────────────────────

  get tickPhase(): string {
    return this.clock.phase;
  }

  get inputBuffer(): string {
    return this.input.buffer;
  }

  activeMode(): Mode<T> | null {
    return this.modes.activeMode();
  }

  modeCount(): number {
    return this.modes.count();
  }

  acceptingInput(): boolean {
    return this.modes.acceptingInput();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private dispatch(command: string): void {
    const mode = this.modes.activeMode();
    mode?.handleCommand(command);
    this.callbacks.onCommandDispatched?.(command, mode?.modeId ?? null);
  }

  private assertAlive(): void {
    if (this.destroyed) {
      throw new InvariantViolation("Simulation was destroyed");
    }
  }
}
