export class DescriptorParseError extends Error {
  constructor(
    readonly file: string,
    readonly reason: string
  ) {
    super(`Invalid service descriptor ${file}: ${reason}`);
    this.name = 'DescriptorParseError';
  }
}

export class ProcessTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly timeoutMs: number
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'ProcessTimeoutError';
  }
}

export class ToolNotFoundError extends Error {
  constructor(readonly tool: string) {
    super(`${tool} not found`);
    this.name = 'ToolNotFoundError';
  }
}

export class NonZeroExitError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    super(`Command exited with code ${exitCode}: ${command}${stderr ? ` (${stderr})` : ''}`);
    this.name = 'NonZeroExitError';
  }
}

export class HealthProbeError extends Error {
  constructor(
    readonly url: string,
    reason: string
  ) {
    super(`Health probe failed for ${url}: ${reason}`);
    this.name = 'HealthProbeError';
  }
}
