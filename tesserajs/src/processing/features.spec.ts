import { expect } from "chai";

import { FeatureExtractionError } from "../errors.js";
import { extractFeatures } from "./features.js";

describe("feature extraction", () => {
  it("averages every pixel of every band", () => {
    const features = extractFeatures({
      id: "t",
      bands: [Uint8Array.of(0, 10, 20, 30), Uint8Array.of(40, 50, 60, 70)],
    });

    expect(features.meanIntensity).to.be.closeTo(35, 1e-9);
    expect(features.stdIntensity).to.be.closeTo(Math.sqrt(525), 1e-9);
  });

  it("is exact on a uniform tile", () => {
    const features = extractFeatures({
      id: "t",
      bands: [new Uint8Array(256 * 256).fill(45)],
    });

    expect(features).to.deep.equal({ meanIntensity: 45, stdIntensity: 0 });
  });

  it("excludes nodata pixels", () => {
    const features = extractFeatures({
      id: "t",
      bands: [Uint8Array.of(0, 0, 20, 40)],
      nodata: 0,
    });

    expect(features.meanIntensity).to.equal(30);
  });

  it("counts zero pixels when nodata is not defined", () => {
    const features = extractFeatures({
      id: "t",
      bands: [Uint8Array.of(0, 0, 20, 40)],
    });

    expect(features.meanIntensity).to.be.closeTo(15, 1e-9);
  });

  it("skips NaN samples", () => {
    const features = extractFeatures({
      id: "t",
      bands: [Float32Array.of(Number.NaN, 2, 4)],
    });

    expect(features.meanIntensity).to.equal(3);
  });

  it("fails when every pixel is masked", () => {
    expect(() =>
      extractFeatures({ id: "empty", bands: [Uint8Array.of(7, 7)], nodata: 7 }),
    ).to.throw(FeatureExtractionError, "tile empty has no valid pixel");
  });
});
