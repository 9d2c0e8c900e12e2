import type { CatalogStore } from "../db";
import type { IdsCreated, IdsResolved, Manufacturer, Model } from "../types";
import { EntityWriter } from "../writer";

/** What one submission has resolved so far; later sections read earlier ones */
export interface SubmissionContext {
  store: CatalogStore;
  writer: EntityWriter;
  manufacturer: Manufacturer | null;
  /** Names the context manufacturer answers to: stored and submitted */
  manufacturerNames: string[];
  model: Model | null;
  /** Names the context model answers to: stored and submitted */
  modelNames: string[];
  modelManufacturerNames: string[];
  actions: string[];
  idsCreated: IdsCreated;
  idsResolved: IdsResolved;
}

export function createSubmissionContext(store: CatalogStore, createdBy: string): SubmissionContext {
  return {
    store,
    writer: new EntityWriter(store, createdBy),
    manufacturer: null,
    manufacturerNames: [],
    model: null,
    modelNames: [],
    modelManufacturerNames: [],
    actions: [],
    idsCreated: {},
    idsResolved: {},
  };
}
