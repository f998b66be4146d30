#!/usr/bin/env node

import { main } from "./main";
import { fatal } from "./output";

main(process.argv).catch((err: unknown) => {
	fatal(err instanceof Error ? err.message : String(err));
});
