/**
 * Base error for all setup errors
 */
export class SetupError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "SetupError";
  }

  /**
   * Suggested fix for the error (optional)
   */
  help?(): string;
}

/**
 * Configuration errors
 */
export class ConfigError extends SetupError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/**
 * Docker operation errors
 */
export class DockerError extends SetupError {
  constructor(message: string) {
    super(message, "DOCKER_ERROR");
    this.name = "DockerError";
  }
}

export class DockerNotInstalledError extends DockerError {
  constructor() {
    super("Docker is not installed. Please install Docker first.");
  }

  override help() {
    return "See https://docs.docker.com/engine/install/";
  }
}

export class DockerNotRunningError extends DockerError {
  constructor() {
    super("Docker is not running. Please start Docker first.");
  }

  override help() {
    return "Run: sudo systemctl start docker";
  }
}

export class DockerPermissionError extends DockerError {
  constructor() {
    super("Permission denied accessing Docker socket");
  }

  override help() {
    return "Add user to docker group: sudo usermod -aG docker $USER && newgrp docker";
  }
}

/**
 * A `docker run` that did not produce a container
 */
export class ContainerStartError extends DockerError {
  constructor(
    public containerName: string,
    reason: string,
  ) {
    super(`Failed to start container '${containerName}': ${reason}`);
  }

  override help() {
    return `Inspect the container with: docker logs ${this.containerName}`;
  }
}

/**
 * A dependency did not become ready within its polling window
 */
export class ReadinessTimeoutError extends SetupError {
  constructor(
    public service: string,
    public timeoutMs: number,
  ) {
    super(`${service} was not ready after ${Math.round(timeoutMs / 1000)}s`, "READINESS_TIMEOUT");
    this.name = "ReadinessTimeoutError";
  }

  override help() {
    return "Raise the readiness timeouts in the config file, or check the host load";
  }
}

/**
 * Not found errors
 */
export class NotFoundError extends SetupError {
  constructor(type: string, name: string) {
    super(`${type} not found: ${name}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}
