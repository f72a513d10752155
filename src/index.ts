#!/usr/bin/env node

import { main } from "./cli/main";
import { terminate } from "./cli/run";

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    process.exit(terminate(error));
  });
