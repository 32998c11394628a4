/**
 * Terminal progress line for long scans. On a TTY a spinner line is redrawn
 * in place and finished packages are printed above it; elsewhere only the
 * finished-package lines are written.
 */

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']
const SPINNER_INTERVAL = 80 // ms

export interface ProgressOptions {
  /** Stream to write to (default: process.stderr) */
  stream?: NodeJS.WriteStream
  /** Suppress all output */
  disabled?: boolean
}

export class ProgressDisplay {
  private readonly stream: NodeJS.WriteStream
  private readonly disabled: boolean
  private frameIndex = 0
  private status = ''
  private timer: ReturnType<typeof setInterval> | null = null

  constructor(options: ProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr
    this.disabled = options.disabled ?? false
  }

  get isActive(): boolean {
    return this.timer !== null
  }

  private get animated(): boolean {
    return !this.disabled && this.stream.isTTY === true
  }

  start(status: string): this {
    this.status = status
    if (!this.animated || this.timer) return this

    this.render()
    this.timer = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length
      this.render()
    }, SPINNER_INTERVAL)
    // Never keep the process alive just for the animation
    this.timer.unref()
    return this
  }

  update(status: string): this {
    this.status = status
    if (this.isActive) this.render()
    return this
  }

  /**
   * Print a permanent line above the spinner
   */
  line(text: string): this {
    if (this.disabled) return this
    if (this.isActive) {
      this.stream.write(`\r\x1b[K${text}\n`)
      this.render()
    } else {
      this.stream.write(`${text}\n`)
    }
    return this
  }

  stop(): this {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
      this.stream.write('\r\x1b[K')
    }
    return this
  }

  private render(): void {
    const frame = SPINNER_FRAMES[this.frameIndex]
    this.stream.write(`\r\x1b[K${frame} ${this.status}`)
  }
}

export function createProgressDisplay(options?: ProgressOptions): ProgressDisplay {
  return new ProgressDisplay(options)
}
