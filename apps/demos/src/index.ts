import * as dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

import { runCli } from "./cli";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

process.exitCode = await runCli(process.argv.slice(2));
