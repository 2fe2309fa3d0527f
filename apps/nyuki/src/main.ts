import { describeError, logError } from '@nyuki/sdk'
import { main } from './agent'

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    logError(`Fatal: ${describeError(err)}`)
    process.exitCode = 1
  }
)
