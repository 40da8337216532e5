import { getConfigFromCli } from "./arg-parser.js";
import type { VeniceConfig } from "./types.js";

let config: VeniceConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};

export type { VeniceConfig } from "./types.js";
