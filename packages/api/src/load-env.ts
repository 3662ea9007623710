import { config as loadDotenv } from 'dotenv'
import { fileURLToPath } from 'url'
import path from 'path'

// Load .env from repo root (monorepo) or cwd.
// Imported first by index.ts so instrumentation sees the OTEL_* variables.
const __dirname = path.dirname(fileURLToPath(import.meta.url))
loadDotenv({ path: path.resolve(__dirname, '../../../.env') })
loadDotenv()
