import { log } from "@mailstop/logger"
import { run } from "./server"

run().catch((err: unknown) => {
  log("error", "Failed to start", {}, err)
  process.exit(1)
})
