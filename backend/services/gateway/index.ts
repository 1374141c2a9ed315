// backend/services/gateway/index.ts
/**
 * Gateway Entry. See src/bootstrap.ts for the boot order and exit codes.
 */

import { bootstrap } from "./src/bootstrap";

void bootstrap();
