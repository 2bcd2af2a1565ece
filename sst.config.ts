import type { SSTConfig } from "sst";
import { DBStack } from "./stacks/DBStack";
import { FunctionsStack } from "./stacks/FunctionsStack";

export default {
  config(_input) {
    return {
      name: "peliculas",
      region: "us-east-1",
    };
  },
  stacks(app) {
    app.stack(DBStack).stack(FunctionsStack);
  },
} satisfies SSTConfig;
