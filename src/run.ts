import yargs from 'yargs'
import { scanCommand } from './commands/scan.js'
import { statusCommand } from './commands/status.js'
import { clearCommand } from './commands/clear.js'
import { errorMessage } from './utils.js'

/**
 * Configuration options for running the scanner programmatically.
 */
export interface ScannerOptions {
  /** Registry URL (e.g., https://registry.npmjs.org). */
  registryUrl?: string
  /** Registry access token. */
  token?: string
  /** Proxy for HTTP registries. */
  httpProxy?: string
  /** Proxy for HTTPS registries. */
  httpsProxy?: string
  /** Proxy credentials. */
  proxyUser?: string
  proxyPassword?: string
  /** Enable debug logging. */
  debug?: boolean
}

/**
 * Run the scanner programmatically with provided arguments and options.
 * Maps options to environment variables before executing yargs commands.
 *
 * Command handlers end the process with their own exit code once they
 * finish, so this only returns when no handler ran.
 *
 * @param args - Command line arguments to pass to yargs (e.g., ['scan', 'deps.xlsx']).
 * @param options - Configuration options that override environment variables.
 * @returns 0 after help or version output, 1 for invalid arguments.
 */
export async function runScanner(
  args: string[],
  options?: ScannerOptions,
): Promise<number> {
  const mapping: Array<[string | undefined, string]> = [
    [options?.registryUrl, 'REGISTRY_SCAN_REGISTRY_URL'],
    [options?.token, 'REGISTRY_SCAN_TOKEN'],
    [options?.httpProxy, 'REGISTRY_SCAN_HTTP_PROXY'],
    [options?.httpsProxy, 'REGISTRY_SCAN_HTTPS_PROXY'],
    [options?.proxyUser, 'REGISTRY_SCAN_PROXY_USER'],
    [options?.proxyPassword, 'REGISTRY_SCAN_PROXY_PASSWORD'],
  ]
  for (const [value, name] of mapping) {
    if (value) {
      process.env[name] = value
    }
  }
  if (options?.debug) {
    process.env['REGISTRY_SCAN_DEBUG'] = '1'
  }

  try {
    await yargs(args)
      .scriptName('registry-scan')
      .usage('$0 <command> [options]')
      .command(scanCommand)
      .command(statusCommand)
      .command(clearCommand)
      .demandCommand(1, 'You must specify a command')
      .help()
      .alias('h', 'help')
      .strict()
      .exitProcess(false)
      .fail((message, err) => {
        throw err ?? new Error(message)
      })
      .parse()

    return 0
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`)
    if (process.env['REGISTRY_SCAN_DEBUG']) {
      console.error('registry-scan error:', error)
    }
    return 1
  }
}
