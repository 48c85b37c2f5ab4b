import { describe, it, expect, vi } from "vitest";
import { XArmActuator, type ArmTransport } from "./xarm-actuator.js";
import type { ArmPositions } from "./arm-positions.js";
import { XArmCommand, encodeMove, encodePacket, encodeReadPositions, encodeUnload } from "./xarm-protocol.js";
import { ActuationFailure, StartupFailure } from "./errors.js";

// ─── Fakes ──────────────────────────────────────────────────────────────────────

const POSITIONS: ArmPositions = {
  home: [505, 501, 109, 526, 511, 508],
  pickup: [501, 501, 301, 895, 508, 507],
  bins: {
    fruit: [501, 501, 301, 821, 507, 828],
    snack: [501, 501, 301, 821, 508, 979],
    drink: [501, 501, 301, 801, 509, 720],
  },
  gripperOpen: 50,
  gripperClose: 700,
  moveMs: 1500,
};

/** Records every packet and answers position reads with `gripperPosition`. */
class FakeArmTransport implements ArmTransport {
  readonly writes: Buffer[] = [];
  readonly open = vi.fn(async () => {});
  readonly close = vi.fn(async () => {});
  gripperPosition = 612;
  answerReads = true;
  failOn: ((packet: Buffer) => boolean) | null = null;
  private listener: ((chunk: Buffer) => void) | null = null;

  async write(packet: Buffer): Promise<void> {
    if (this.failOn?.(packet)) throw new Error("serial write failed");
    this.writes.push(packet);
    if (packet[3] === XArmCommand.ServoPositionRead && this.answerReads) {
      const p = this.gripperPosition;
      this.listener?.(encodePacket(XArmCommand.ServoPositionRead, [1, 1, p & 0xff, p >> 8]));
    }
  }

  onData(listener: (chunk: Buffer) => void): () => void {
    this.listener = listener;
    return () => {
      this.listener = null;
    };
  }

  commands(): number[] {
    return this.writes.map((w) => w[3]);
  }
}

function body(pose: readonly number[]) {
  return [2, 3, 4, 5, 6].map((id) => ({ id, position: pose[id - 1] }));
}

/** Packets for a gripper move followed by pressure relief. */
function gripperPackets(target: number, relievedAt: number): Buffer[] {
  return [
    encodeMove([{ id: 1, position: target }], 1500),
    encodeReadPositions([1]),
    encodeUnload([1]),
    encodeMove([{ id: 1, position: relievedAt }], 500),
  ];
}

function createArm(transport = new FakeArmTransport(), readTimeoutMs = 1000) {
  const wait = vi.fn(async (_ms: number) => {});
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const arm = new XArmActuator(transport, POSITIONS, { wait, logger, readTimeoutMs });
  return { arm, transport, wait };
}

async function connectedArm(transport = new FakeArmTransport(), readTimeoutMs = 1000) {
  const created = createArm(transport, readTimeoutMs);
  await created.arm.connect();
  transport.writes.length = 0;
  created.wait.mockClear();
  return created;
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("XArmActuator.connect", () => {
  it("opens the port, homes the arm and opens the gripper", async () => {
    const { arm, transport } = createArm();
    await arm.connect();

    expect(transport.open).toHaveBeenCalledTimes(1);
    expect(arm.isConnected).toBe(true);
    expect(transport.writes).toEqual([encodeMove(body(POSITIONS.home), 1500), ...gripperPackets(50, 612)]);
  });

  it("reports an unreachable arm as a startup failure", async () => {
    const transport = new FakeArmTransport();
    transport.open.mockRejectedValueOnce(new Error("port busy"));
    const { arm } = createArm(transport);

    const connecting = arm.connect();
    await expect(connecting).rejects.toBeInstanceOf(StartupFailure);
    await expect(connecting).rejects.toThrow("Failed to initialize arm: port busy");
    expect(arm.isConnected).toBe(false);
  });
});

describe("XArmActuator.sort", () => {
  it("runs the full pick-and-place sequence for the category's bin", async () => {
    const { arm, transport } = await connectedArm();
    await arm.sort("drink");

    expect(transport.writes).toEqual([
      encodeMove(body(POSITIONS.home), 1500),
      ...gripperPackets(50, 612),
      encodeMove(body(POSITIONS.pickup), 1500),
      ...gripperPackets(700, 612),
      encodeMove(body(POSITIONS.home), 1500),
      encodeMove(body(POSITIONS.bins.drink), 1500),
      ...gripperPackets(50, 612),
      encodeMove(body(POSITIONS.home), 1500),
    ]);
  });

  it("re-seats the gripper at the position it reports", async () => {
    const transport = new FakeArmTransport();
    const { arm } = await connectedArm(transport);
    transport.gripperPosition = 655;
    await arm.sort("fruit");

    const reliefMoves = transport.writes.filter(
      (w) => w[3] === XArmCommand.ServoMove && w[4] === 1 && w[5] === (500 & 0xff),
    );
    expect(reliefMoves).toEqual([
      encodeMove([{ id: 1, position: 655 }], 500),
      encodeMove([{ id: 1, position: 655 }], 500),
      encodeMove([{ id: 1, position: 655 }], 500),
    ]);
  });

  it("waits for each move and pauses between steps", async () => {
    const { arm, wait } = await connectedArm();
    await arm.sort("snack");

    const waits = wait.mock.calls.map(([ms]) => ms);
    expect(waits.filter((ms) => ms === 1500)).toHaveLength(8);
    expect(waits.filter((ms) => ms === 500)).toHaveLength(3);
    expect(waits.filter((ms) => ms === 100)).toHaveLength(3);
    expect(waits.filter((ms) => ms === 300)).toHaveLength(8);
  });

  it("names the failing step", async () => {
    const transport = new FakeArmTransport();
    const { arm } = await connectedArm(transport);
    const pickupMove = encodeMove(body(POSITIONS.pickup), 1500);
    transport.failOn = (packet) => packet.equals(pickupMove);

    const sorting = arm.sort("fruit");
    await expect(sorting).rejects.toBeInstanceOf(ActuationFailure);
    await expect(sorting).rejects.toThrow('Arm failed at "pickup": serial write failed');
    expect(transport.commands()).toEqual([3, 3, 21, 20, 3]);
  });

  it("fails when the gripper position is never reported", async () => {
    const transport = new FakeArmTransport();
    const { arm } = await connectedArm(transport, 10);
    transport.answerReads = false;

    await expect(arm.sort("snack")).rejects.toThrow('Arm failed at "open gripper": No position reply within 10ms');
  });

  it("refuses to move before connect", async () => {
    const { arm } = createArm();
    await expect(arm.sort("fruit")).rejects.toThrow("Arm is not connected");
  });

  it("refuses a second sort while one is running", async () => {
    const { arm } = await connectedArm();
    const first = arm.sort("fruit");
    await expect(arm.sort("drink")).rejects.toThrow("Arm is already moving");
    await first;
  });

  it("accepts a new sort after a failed one", async () => {
    const transport = new FakeArmTransport();
    const { arm } = await connectedArm(transport);
    transport.failOn = () => true;
    await expect(arm.sort("fruit")).rejects.toThrow(ActuationFailure);

    transport.failOn = null;
    await expect(arm.sort("fruit")).resolves.toBeUndefined();
  });
});

describe("XArmActuator.home and close", () => {
  it("homes the body", async () => {
    const { arm, transport } = await connectedArm();
    await arm.home();
    expect(transport.writes).toEqual([encodeMove(body(POSITIONS.home), 1500)]);
  });

  it("closes the transport and disconnects", async () => {
    const { arm, transport } = await connectedArm();
    await arm.close();
    expect(transport.close).toHaveBeenCalledTimes(1);
    expect(arm.isConnected).toBe(false);
    await expect(arm.home()).rejects.toThrow("Arm is not connected");
  });
});
