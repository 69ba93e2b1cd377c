#!/usr/bin/env node
import { main } from "./scripts/merge-csv";

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error("Unhandled error in merge:", error);
    process.exit(1);
  });
