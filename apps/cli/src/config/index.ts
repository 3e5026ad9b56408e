import { getConfigFromCli } from "./arg-parser.js";
import type { LocusConfig } from "./types.js";

let config: LocusConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
