import { describe, expect, test, vi } from "vitest";
import { buildRunArgs, DockerClient } from "../../../src/core/docker-client.ts";
import { buildTopology } from "../../../src/core/topology.ts";
import type { ExecResult } from "../../../src/types/docker.ts";
import {
  ContainerStartError,
  DockerError,
  DockerNotInstalledError,
  DockerNotRunningError,
  DockerPermissionError,
} from "../../../src/types/errors.ts";
import { testConfig } from "../../helpers/test-helpers.ts";

function result(exitCode: number, stdout = "", stderr = ""): ExecResult {
  return { exitCode, stdout, stderr };
}

function clientReturning(...results: ExecResult[]) {
  const run = vi.fn(async (_command: string, _args: string[]) => results.shift() ?? result(0));
  return { client: new DockerClient({ run }), run };
}

describe("buildRunArgs", () => {
  test("maps the application container onto docker run flags", () => {
    const config = testConfig({ data_dir: "/srv/faraday" });
    const { app } = buildTopology(config);

    expect(buildRunArgs(app)).toEqual([
      "run",
      "-d",
      "--name",
      "faraday_app",
      "--network",
      "faraday_network",
      "-v",
      "/srv/faraday:/home/faraday/.faraday",
      "-p",
      "5985:5985",
      "-e",
      "PGSQL_USER=postgres",
      "-e",
      "PGSQL_HOST=faraday_postgres",
      "-e",
      "PGSQL_PASSWD=postgres",
      "-e",
      "PGSQL_DBNAME=faraday",
      "-e",
      "REDIS_SERVER=faraday_redis",
      "--entrypoint=/entrypoint.sh",
      "faradaysec/faraday:latest",
    ]);
  });

  test("omits entrypoint and volumes when the container has none", () => {
    const { redis } = buildTopology(testConfig());

    expect(buildRunArgs(redis)).toEqual([
      "run",
      "-d",
      "--name",
      "faraday_redis",
      "--network",
      "faraday_network",
      "-p",
      "6379:6379",
      "redis:6.2-alpine",
    ]);
  });
});

describe("DockerClient", () => {
  describe("isInstalled", () => {
    test("false when the binary cannot be spawned", async () => {
      const { client, run } = clientReturning(result(127, "", "spawn docker ENOENT"));

      expect(await client.isInstalled()).toBe(false);
      expect(run).toHaveBeenCalledWith("docker", ["--version"]);
    });

    test("true when docker --version runs", async () => {
      const { client } = clientReturning(result(0, "Docker version 24.0.7"));

      expect(await client.isInstalled()).toBe(true);
    });
  });

  describe("checkPermissions", () => {
    test("passes when docker info succeeds", async () => {
      const { client } = clientReturning(result(0));

      expect(await client.checkPermissions()).toBe(true);
    });

    test("detects a stopped daemon", async () => {
      const { client } = clientReturning(
        result(
          1,
          "",
          "Cannot connect to the Docker daemon at unix:///var/run/docker.sock. Is the docker daemon running?",
        ),
      );

      await expect(client.checkPermissions()).rejects.toBeInstanceOf(DockerNotRunningError);
    });

    test("detects a permission problem", async () => {
      const { client } = clientReturning(
        result(
          1,
          "",
          "Got permission denied while trying to connect to the Docker daemon socket at unix:///var/run/docker.sock",
        ),
      );

      await expect(client.checkPermissions()).rejects.toBeInstanceOf(DockerPermissionError);
    });

    test("detects a missing binary", async () => {
      const { client } = clientReturning(result(127));

      await expect(client.checkPermissions()).rejects.toBeInstanceOf(DockerNotInstalledError);
    });

    test("reports anything else as a DockerError", async () => {
      const { client } = clientReturning(result(1, "", "context deadline exceeded\n"));

      await expect(client.checkPermissions()).rejects.toThrow("Docker error: context deadline exceeded");
    });
  });

  describe("listContainers", () => {
    test("parses JSON lines and skips malformed ones", async () => {
      const lines = [
        JSON.stringify({
          ID: "0123456789abcdef",
          Names: "faraday_app",
          Image: "faradaysec/faraday:latest",
          State: "running",
          Status: "Up 2 minutes",
          Networks: "faraday_network",
        }),
        "not json",
        JSON.stringify({
          ID: "fedcba9876543210",
          Names: "faraday_redis",
          Image: "redis:6.2-alpine",
          State: "exited",
          Status: "Exited (0) 1 hour ago",
          Networks: "",
        }),
      ];
      const { client, run } = clientReturning(result(0, `${lines.join("\n")}\n`));

      const containers = await client.listContainers({
        all: true,
        names: ["faraday_app", "faraday_redis"],
      });

      expect(run).toHaveBeenCalledWith("docker", [
        "ps",
        "--format",
        "{{json .}}",
        "-a",
        "--filter",
        "name=^faraday_app$",
        "--filter",
        "name=^faraday_redis$",
      ]);
      expect(containers).toEqual([
        {
          id: "0123456789ab",
          name: "faraday_app",
          image: "faradaysec/faraday:latest",
          running: true,
          state: "running",
          status: "Up 2 minutes",
          networks: ["faraday_network"],
        },
        {
          id: "fedcba987654",
          name: "faraday_redis",
          image: "redis:6.2-alpine",
          running: false,
          state: "exited",
          status: "Exited (0) 1 hour ago",
          networks: [],
        },
      ]);
    });

    test("throws when docker ps fails", async () => {
      const { client } = clientReturning(result(1, "", "boom"));

      await expect(client.listContainers()).rejects.toBeInstanceOf(DockerError);
    });
  });

  describe("getContainer", () => {
    test("parses docker inspect output", async () => {
      const inspect = [
        {
          Id: "abcdef0123456789",
          Name: "/faraday_postgres",
          State: { Status: "running", Running: true },
          Config: { Image: "postgres:12.7-alpine" },
          NetworkSettings: { Networks: { faraday_network: { IPAddress: "172.18.0.2" } } },
        },
      ];
      const { client } = clientReturning(result(0, JSON.stringify(inspect)));

      expect(await client.getContainer("faraday_postgres")).toEqual({
        id: "abcdef012345",
        name: "faraday_postgres",
        image: "postgres:12.7-alpine",
        running: true,
        state: "running",
        status: "running",
        networks: ["faraday_network"],
      });
    });

    test("returns null for a missing container", async () => {
      const { client } = clientReturning(result(1, "[]", "Error: No such container: faraday_app"));

      expect(await client.getContainer("faraday_app")).toBeNull();
      expect(await client.containerExists("faraday_app")).toBe(false);
    });

    test("isContainerRunning reads the inspected state", async () => {
      const stopped = [{ Id: "1", Name: "/faraday_app", State: { Status: "exited", Running: false } }];
      const { client } = clientReturning(result(0, JSON.stringify(stopped)));

      expect(await client.isContainerRunning("faraday_app")).toBe(false);
    });
  });

  describe("runContainer", () => {
    test("returns the container id", async () => {
      const { client } = clientReturning(result(0, "4f2a9c1e7b3d\n"));

      expect(await client.runContainer(buildTopology(testConfig()).redis)).toBe("4f2a9c1e7b3d");
    });

    test("wraps a failed run in ContainerStartError", async () => {
      const { client } = clientReturning(
        result(125, "", 'docker: Error response from daemon: Conflict. The container name "/faraday_redis" is already in use.\n'),
      );

      const error = await client.runContainer(buildTopology(testConfig()).redis).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ContainerStartError);
      expect(error).toHaveProperty(
        "message",
        `Failed to start container 'faraday_redis': docker: Error response from daemon: Conflict. The container name "/faraday_redis" is already in use.`,
      );
    });
  });

  describe("container and network commands", () => {
    test("removeContainer forwards --force", async () => {
      const { client, run } = clientReturning(result(0));

      await client.removeContainer("faraday_app", { force: true });

      expect(run).toHaveBeenCalledWith("docker", ["rm", "-f", "faraday_app"]);
    });

    test("network create failure surfaces stderr", async () => {
      const { client } = clientReturning(result(1, "", "network with name faraday_network already exists\n"));

      await expect(client.createNetwork("faraday_network")).rejects.toThrow(
        "Failed to create network 'faraday_network': network with name faraday_network already exists",
      );
    });

    test("exec passes the command through", async () => {
      const { client, run } = clientReturning(result(0, "PONG\n"));

      const output = await client.exec("faraday_redis", ["redis-cli", "ping"]);

      expect(output.stdout).toBe("PONG\n");
      expect(run).toHaveBeenCalledWith("docker", ["exec", "faraday_redis", "redis-cli", "ping"]);
    });

    test("logs streams to the terminal", async () => {
      const { client, run } = clientReturning(result(0));

      await client.logs("faraday_app", { follow: true, tail: 50 });

      expect(run).toHaveBeenCalledWith("docker", ["logs", "-f", "--tail", "50", "faraday_app"], {
        inherit: true,
      });
    });
  });
});
