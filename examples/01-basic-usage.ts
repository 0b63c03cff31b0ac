/**
 * Basic trailrunner usage: a two-window ferry simulation
 *
 * Run: npx tsx examples/01-basic-usage.ts
 */

import {
  BaseMode,
  createLogger,
  type DialogKind,
  type DialogResponse,
  DialogState,
  defineRegistry,
  type ModeHost,
  Simulation,
  type SimulationDomain,
  type SimulationTypes,
  type TickEvent,
} from "trailrunner";

class FerryDomain implements SimulationDomain {
  crossing = false;
  bank: "west" | "east" = "west";

  vehicleStatus(): string {
    return this.crossing ? "Sailing" : "Docked";
  }

  locationStatus(): string {
    return `${this.bank} bank`;
  }
}

interface FerryTypes extends SimulationTypes {
  readonly modeId: "dock" | "crossing";
  readonly stateId: "ticket";
  readonly domain: FerryDomain;
}

class DockMode extends BaseMode<FerryTypes> {
  readonly modeId = "dock";
  readonly acceptsInput = true;

  protected onRender(): string {
    return "1. Buy a ticket\n2. Leave";
  }

  protected onCommand(command: string): void {
    if (command === "1") this.setState("ticket");
    if (command === "2") this.removeMode();
  }
}

/** Asks for confirmation, then pushes the crossing window */
class TicketState extends DialogState<FerryTypes> {
  readonly stateId = "ticket";
  readonly dialogKind: DialogKind = "yesNo";

  protected onDialogPrompt(): string {
    return "A ticket costs $2.";
  }

  protected onDialogResponse(response: DialogResponse): void {
    this.clearState();
    if (response === "yes") {
      this.host.addMode("crossing");
    }
  }
}

class CrossingMode extends BaseMode<FerryTypes> {
  readonly modeId = "crossing";
  readonly acceptsInput = false;

  constructor(host: ModeHost<FerryTypes>) {
    super(host);
    host.domain.crossing = true;
  }

  protected onRender(): string {
    return "The ferry pushes off into the current.";
  }

  protected onTick(event: TickEvent): void {
    const domain = this.host.domain;
    if (event.systemTick) return;

    // Arrive on the first pulse
    domain.crossing = false;
    domain.bank = domain.bank === "west" ? "east" : "west";
    this.host.takeTurn();
    this.removeMode();
  }

  // Input is refused while sailing
  protected onCommand(): void {}
}

const registry = defineRegistry<FerryTypes>({
  modeIds: ["dock", "crossing"],
  modes: { dock: DockMode, crossing: CrossingMode },
  states: { dock: { ticket: TicketState } },
});

function main() {
  console.log("=== Basic trailrunner Usage ===\n");

  // A manual clock keeps the run deterministic
  let now = 0;
  const sim = Simulation.create<FerryTypes>({
    registry,
    domain: new FerryDomain(),
    pulseIntervalMs: 1000,
    now: () => now,
    logger: createLogger({ name: "ferry", minLevel: 3 }),
    callbacks: {
      onBufferChanged: (frame) => console.log(`${frame}\n---`),
      onModeChanged: (modeId) => console.log(`[mode] ${modeId}`),
    },
  });

  sim.start(["dock"]);
  sim.tick();

  for (const command of ["1", "y"]) {
    for (const ch of command) sim.input.addChar(ch);
    sim.input.submit();
    sim.tick();
  }

  // One pulse later the ferry lands and the dock window is back
  now += 1000;
  sim.tick();
  sim.tick();

  console.log(`Turns taken: ${sim.turns}`);
  sim.destroy();
}

main();
