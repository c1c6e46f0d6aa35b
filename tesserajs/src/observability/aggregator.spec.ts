import { expect } from "chai";

import { AggregatorFinalizedError } from "../errors.js";
import { MetricsAggregator } from "./aggregator.js";

describe("metrics aggregator", () => {
  it("finalizes an empty run", () => {
    const metrics = new MetricsAggregator().finalize();

    expect(metrics).to.deep.equal({
      tilesInferred: 0,
      tilesFailed: 0,
      failureRatio: 0,
      classHistogram: [0, 0],
      positiveRatio: null,
      meanIntensity: null,
      latencyMs: null,
    });
  });

  it("counts successes per class and failures", () => {
    const aggregator = new MetricsAggregator();
    aggregator.recordSuccess({ tileId: "a", latencyMs: 2, meanIntensity: 10, prediction: 0 });
    aggregator.recordSuccess({ tileId: "b", latencyMs: 4, meanIntensity: 50, prediction: 1 });
    aggregator.recordSuccess({ tileId: "c", latencyMs: 6, meanIntensity: 60, prediction: 1 });
    aggregator.recordFailure("d", new Error("unreadable"));

    const metrics = aggregator.finalize();

    expect(metrics.tilesInferred).to.equal(3);
    expect(metrics.tilesFailed).to.equal(1);
    expect(metrics.failureRatio).to.equal(0.25);
    expect(metrics.classHistogram).to.deep.equal([1, 2]);
    expect(metrics.positiveRatio).to.be.closeTo(2 / 3, 1e-12);
    expect(metrics.meanIntensity?.mean).to.be.closeTo(40, 1e-9);
    expect(metrics.meanIntensity?.min).to.equal(10);
    expect(metrics.meanIntensity?.max).to.equal(60);
    expect(metrics.latencyMs?.mean).to.be.closeTo(4, 1e-12);
    expect(metrics.latencyMs?.count).to.equal(3);
  });

  it("reports a run where every tile failed", () => {
    const aggregator = new MetricsAggregator();
    aggregator.recordFailure("a", "broken");
    aggregator.recordFailure("b", "broken");

    const metrics = aggregator.finalize();

    expect(metrics.failureRatio).to.equal(1);
    expect(metrics.positiveRatio).to.be.null;
    expect(metrics.meanIntensity).to.be.null;
  });

  it("freezes what it returns", () => {
    const aggregator = new MetricsAggregator();
    aggregator.recordSuccess({ tileId: "a", latencyMs: 1, meanIntensity: 1, prediction: 0 });

    const metrics = aggregator.finalize();

    expect(aggregator.finalized).to.be.true;
    expect(Object.isFrozen(metrics)).to.be.true;
    expect(Object.isFrozen(metrics.classHistogram)).to.be.true;
    expect(Object.isFrozen(metrics.meanIntensity)).to.be.true;
    expect(aggregator.finalize()).to.equal(metrics);
  });

  it("refuses records after finalize", () => {
    const aggregator = new MetricsAggregator();
    aggregator.finalize();

    expect(() =>
      aggregator.recordSuccess({ tileId: "a", latencyMs: 1, meanIntensity: 1, prediction: 1 }),
    ).to.throw(AggregatorFinalizedError);
    expect(() => aggregator.recordFailure("a", "late")).to.throw(
      AggregatorFinalizedError,
    );
  });
});
