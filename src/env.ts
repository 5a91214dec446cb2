/**
 * Load .env before the logger and scheduler read process.env.
 * Must be the first import in cli.ts.
 */
import 'dotenv/config'
