import { ManufacturerStrategy } from "./manufacturer";
import { ModelStrategy } from "./model";
import { IndividualGuitarStrategy } from "./individual-guitar";

export { scoreManufacturer } from "./manufacturer";
export { scoreGuitar } from "./individual-guitar";
export { createSubmissionContext } from "./context";
export type { SubmissionContext } from "./context";
export type { EntityStrategy } from "./types";
export type { ModelQuery, ModelTarget } from "./model";
export type { GuitarQuery, GuitarTarget } from "./individual-guitar";

export const manufacturerStrategy = new ManufacturerStrategy();
export const modelStrategy = new ModelStrategy();
export const individualGuitarStrategy = new IndividualGuitarStrategy();
