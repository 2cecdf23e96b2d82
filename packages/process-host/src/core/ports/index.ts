export type { ProcessSpawner, RunningProcessHandle, SpawnParams, SpawnCallbacks } from "./ProcessSpawner.js";
