import { expect } from "chai";
import { List, Map } from "immutable";

import { healthConfig } from "../config.js";
import {
  ModelNotFoundError,
  NoTilesError,
  RunnerStateError,
  SerializationError,
  TileReadError,
} from "../errors.js";
import { ThresholdClassifier } from "../models/index.js";
import type { Tile, TileStore } from "../types/index.js";
import { BatchRunner } from "./runner.js";
import type { ModelStore, SnapshotStore } from "./runner.js";
import { parseSnapshot, serializeSnapshot } from "./snapshot.js";
import type { BatchSnapshot } from "./snapshot.js";

function uniformTile(id: string, intensity: number): Tile {
  return {
    id,
    position: { row: 0, column: 0 },
    width: 8,
    height: 8,
    sampleFormat: "uint8",
    bands: [new Uint8Array(64).fill(intensity)],
    transform: [1, 0, 0, 0, -1, 0],
    crs: { kind: "geographic", epsg: 4326 },
  };
}

class MemoryTiles implements TileStore {
  readonly location = "memory://tiles";
  reads = List<string>();

  private readonly tiles: Map<string, Tile | Error>;

  constructor(content: Record<string, Tile | Error>) {
    this.tiles = Map(Object.entries(content));
  }

  list(): Promise<List<string>> {
    return Promise.resolve(this.tiles.keySeq().toList());
  }

  read(id: string): Promise<Tile> {
    this.reads = this.reads.push(id);
    const entry = this.tiles.get(id);
    if (entry === undefined) return Promise.reject(new TileReadError(`no ${id}`));
    if (entry instanceof Error) return Promise.reject(entry);
    return Promise.resolve(entry);
  }
}

class MemoryModels implements ModelStore {
  loads = 0;

  constructor(private readonly model?: ThresholdClassifier) {}

  load(reference: string): Promise<ThresholdClassifier> {
    this.loads++;
    if (this.model === undefined)
      return Promise.reject(new ModelNotFoundError(reference));
    return Promise.resolve(this.model);
  }
}

class MemorySnapshots implements SnapshotStore {
  written = List<BatchSnapshot>();

  write(snapshot: BatchSnapshot): Promise<string> {
    this.written = this.written.push(snapshot);
    return Promise.resolve(`memory://snapshot/${this.written.size}`);
  }
}

const config = { modelReference: "models/latest_model.json", health: healthConfig() };

describe("batch runner", () => {
  let model: ThresholdClassifier;

  before(async () => {
    model = await ThresholdClassifier.train(
      [10, 10, 10, 10, 10, 50, 50, 50, 50, 50].map((v, i) =>
        uniformTile(`train_${i}`, v),
      ),
    );
  });

  it("predicts every tile in lexicographic order", async () => {
    const tiles = new MemoryTiles({
      tile_r0000_c0001: uniformTile("tile_r0000_c0001", 20),
      tile_r0000_c0000: uniformTile("tile_r0000_c0000", 45),
    });
    const models = new MemoryModels(model);
    const snapshots = new MemorySnapshots();
    const runner = new BatchRunner(config, { tiles, models, snapshots });

    const { snapshot, location } = await runner.run();

    expect(runner.state).to.equal("DONE");
    expect(location).to.equal("memory://snapshot/1");
    expect(models.loads).to.equal(1);
    expect(
      snapshot.predictions.map((p) => [p.tileId, p.prediction, p.meanIntensity]),
    ).to.deep.equal([
      ["tile_r0000_c0000", 1, 45],
      ["tile_r0000_c0001", 0, 20],
    ]);
    expect(snapshot.metadata.modelPath).to.equal("models/latest_model.json");
    expect(snapshot.metadata.modelVersion).to.equal(model.version);
    expect(snapshots.written.toArray()).to.deep.equal([snapshot]);
  });

  it("reports a clean balanced run as healthy", async () => {
    const runner = new BatchRunner(config, {
      tiles: new MemoryTiles({ a: uniformTile("a", 45), b: uniformTile("b", 20) }),
      models: new MemoryModels(model),
      snapshots: new MemorySnapshots(),
    });

    const { snapshot } = await runner.run();
    const { monitoring, healthReport } = snapshot.metadata;

    expect(model.threshold).to.be.closeTo(30, 1e-9);
    expect(monitoring.classHistogram).to.deep.equal([1, 1]);
    expect(monitoring.tilesFailed).to.equal(0);
    // mean moved by 2.5 / 30, spread by -7.5 / 20, both within the default limit
    expect(healthReport.baseline?.stdDelta).to.be.closeTo(-0.375, 1e-9);
    expect(healthReport.status).to.equal("healthy");
    expect(healthReport.recommendations).to.be.empty;
  });

  it("keeps going past an unreadable tile", async () => {
    const tiles = new MemoryTiles({
      a: uniformTile("a", 40),
      b: uniformTile("b", 40),
      c: uniformTile("c", 40),
      e: uniformTile("e", 40),
      d: new TileReadError("corrupt strip"),
    });
    const runner = new BatchRunner(config, {
      tiles,
      models: new MemoryModels(model),
      snapshots: new MemorySnapshots(),
    });

    const { snapshot } = await runner.run();

    expect(snapshot.predictions.map((p) => p.tileId)).to.deep.equal(["a", "b", "c", "e"]);
    expect(snapshot.metadata.tilesInferred).to.equal(4);
    expect(snapshot.metadata.tilesFailed).to.equal(1);
    expect(
      snapshot.metadata.monitoring.tilesInferred +
        snapshot.metadata.monitoring.tilesFailed,
    ).to.equal(5);
    expect(snapshot.metadata.failures).to.deep.equal([
      { tileId: "d", cause: "TileReadError: corrupt strip" },
    ]);
    expect(tiles.reads.toArray()).to.deep.equal(["a", "b", "c", "d", "e"]);
  });

  it("counts a tile without valid pixel as failed", async () => {
    const masked = { ...uniformTile("masked", 0), nodata: 0 };
    const runner = new BatchRunner(config, {
      tiles: new MemoryTiles({ masked, plain: uniformTile("plain", 45) }),
      models: new MemoryModels(model),
      snapshots: new MemorySnapshots(),
    });

    const { snapshot } = await runner.run();

    expect(snapshot.metadata.failures.map((f) => f.tileId)).to.deep.equal(["masked"]);
    expect(snapshot.predictions).to.have.length(1);
  });

  it("publishes a degraded snapshot when every tile fails", async () => {
    const snapshots = new MemorySnapshots();
    const runner = new BatchRunner(config, {
      tiles: new MemoryTiles({ a: new Error("boom"), b: new Error("boom") }),
      models: new MemoryModels(model),
      snapshots,
    });

    const { snapshot } = await runner.run();

    expect(snapshots.written.size).to.equal(1);
    expect(snapshot.predictions).to.be.empty;
    expect(snapshot.metadata.monitoring.failureRatio).to.equal(1);
    expect(snapshot.metadata.healthReport.status).to.equal("degraded");
  });

  it("fails before reading tiles when the model is missing", async () => {
    const tiles = new MemoryTiles({ a: uniformTile("a", 1) });
    const snapshots = new MemorySnapshots();
    const runner = new BatchRunner(config, {
      tiles,
      models: new MemoryModels(),
      snapshots,
    });

    try {
      await runner.run();
      expect.fail("run should have thrown");
    } catch (e) {
      expect(e).to.be.instanceOf(ModelNotFoundError);
    }
    expect(runner.state).to.equal("FAILED");
    expect(tiles.reads.size).to.equal(0);
    expect(snapshots.written.size).to.equal(0);
  });

  it("fails on an empty tile store", async () => {
    const runner = new BatchRunner(config, {
      tiles: new MemoryTiles({}),
      models: new MemoryModels(model),
      snapshots: new MemorySnapshots(),
    });

    try {
      await runner.run();
      expect.fail("run should have thrown");
    } catch (e) {
      expect(e).to.be.instanceOf(NoTilesError);
    }
    expect(runner.state).to.equal("FAILED");
  });

  it("fails when the snapshot cannot be stored", async () => {
    const runner = new BatchRunner(config, {
      tiles: new MemoryTiles({ a: uniformTile("a", 1) }),
      models: new MemoryModels(model),
      snapshots: { write: () => Promise.reject(new Error("disk full")) },
    });

    try {
      await runner.run();
      expect.fail("run should have thrown");
    } catch (e) {
      expect(e).to.be.instanceOf(Error).with.property("message", "disk full");
    }
    expect(runner.state).to.equal("FAILED");
  });

  it("is single use", async () => {
    const runner = new BatchRunner(config, {
      tiles: new MemoryTiles({ a: uniformTile("a", 1) }),
      models: new MemoryModels(model),
      snapshots: new MemorySnapshots(),
    });
    await runner.run();

    try {
      await runner.run();
      expect.fail("second run should have thrown");
    } catch (e) {
      expect(e).to.be.instanceOf(RunnerStateError);
    }
  });

  it("produces the same predictions and metrics on the same input", async () => {
    const content = {
      x: uniformTile("x", 12),
      y: uniformTile("y", 200),
      z: new Error("unreadable"),
    };
    const run = async (): Promise<BatchSnapshot> =>
      (
        await new BatchRunner(config, {
          tiles: new MemoryTiles(content),
          models: new MemoryModels(model),
          snapshots: new MemorySnapshots(),
        }).run()
      ).snapshot;

    const [first, second] = [await run(), await run()];

    const stable = (s: BatchSnapshot): unknown => ({
      predictions: s.predictions.map(({ timestamp: _, ...p }) => p),
      monitoring: { ...s.metadata.monitoring, latencyMs: null },
      health: s.metadata.healthReport,
      failures: s.metadata.failures,
    });
    expect(stable(first)).to.deep.equal(stable(second));
    expect(first.metadata.runId).to.not.equal(second.metadata.runId);
  });

  it("writes a snapshot that parses back", async () => {
    const { snapshot } = await new BatchRunner(config, {
      tiles: new MemoryTiles({ a: uniformTile("a", 45), b: new Error("bad") }),
      models: new MemoryModels(model),
      snapshots: new MemorySnapshots(),
    }).run();

    const parsed = parseSnapshot(serializeSnapshot(snapshot));

    expect(parsed).to.deep.equal(snapshot);
    expect(() =>
      parseSnapshot(serializeSnapshot({ ...snapshot, predictions: [] })),
    ).to.throw(SerializationError, "lists 0 predictions for 1 inferred tiles");
  });

  it("rejects a malformed snapshot", () => {
    const document = {
      metadata: { runId: "r" },
      predictions: [],
    };

    expect(() => parseSnapshot(JSON.stringify(document))).to.throw(
      SerializationError,
      "malformed batch snapshot",
    );
    expect(() => parseSnapshot("not json")).to.throw(SerializationError);
  });
});
