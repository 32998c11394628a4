import * as readline from 'readline'

/**
 * Ask a yes/no question on the terminal. An empty answer picks the default.
 */
export async function promptConfirmation(
  message: string,
  defaultYes: boolean = true,
): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  })

  return new Promise(resolve => {
    rl.question(`${message} ${defaultYes ? '[Y/n]' : '[y/N]'} `, answer => {
      rl.close()
      const normalized = answer.trim().toLowerCase()
      if (normalized === '') {
        resolve(defaultYes)
      } else {
        resolve(normalized === 'y' || normalized === 'yes')
      }
    })
  })
}
