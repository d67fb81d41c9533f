import type * as Tallyscript from "../../src/all/mod.ts";

export type TallyscriptModule = typeof Tallyscript;

export async function importTallyscript(): Promise<TallyscriptModule> {
  return import("../../src/all/mod.ts");
}
