import type { SourceType } from "../lib/config";
import type { LineSourceModule } from "./types";
import SerialSource from "./serial";
import FileSource from "./file";
import SimulatedSource from "./simulated";

const registry = new Map<SourceType, LineSourceModule>([
	[SerialSource.type, SerialSource],
	[FileSource.type, FileSource],
	[SimulatedSource.type, SimulatedSource]
]);

/**
 * Resolve a line source module by source type.
 * Throws if the type is unsupported.
 */
export function getLineSourceModule(type: SourceType): LineSourceModule {
	const mod = registry.get(type);
	if (!mod) {
		throw new Error(`Unsupported line source type '${type}'`);
	}
	return mod;
}

export type { LineRead, LineSource, LineSourceModule } from "./types";
