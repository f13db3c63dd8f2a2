/**
 * Core Interfaces Export
 */

export type {
  ClickOptions,
  ISurfaceElement,
  ISurfaceHandle,
  ISurfaceList,
  ISurfacePage,
} from "./ISurface";
export type { IPersistenceSink } from "./IPersistenceSink";
export type { IRunProgressStore } from "./IRunProgressStore";
export type { ICatalogEntrySource } from "./ICatalogEntrySource";
export type { ISessionProvider } from "./ISessionProvider";
