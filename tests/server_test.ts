import assert from "node:assert/strict";
import { once } from "node:events";
import { connect } from "node:net";
import { test } from "node:test";
import { setImmediate } from "node:timers/promises";

import type { ServerOptions } from "../config";
import { createLogger } from "../logging/logger";
import type { LogEntry } from "../logging/logger";
import type { ByteReader, TCPConn } from "../types";
import { listenAndServe, Server } from "../index";
import { Status } from "../protocols/status";
import type { Handler } from "../server/server";

type Running = {
  server: Server;
  port: number;
  done: Promise<void>;
  logs: LogEntry[];
};

async function start(
  handler: Handler,
  options: Partial<ServerOptions> = {},
  openReader?: (conn: TCPConn) => ByteReader
): Promise<Running> {
  const logs: LogEntry[] = [];
  const server = new Server(createLogger("debug", (entry) => logs.push(entry)), openReader);
  const done = server.run({ host: "127.0.0.1", port: 0 }, options, handler);
  await once(server, "listening");
  const addr = server.address();
  assert.ok(addr);
  return { server, port: addr.port, done, logs };
}

async function stop(running: Running): Promise<void> {
  running.server.shutdown();
  await running.done;
}

// sends `data` and collects everything until the server closes.
function exchange(port: number, data: string | Buffer, halfClose = false): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = connect({ host: "127.0.0.1", port }, () => {
      if (data.length > 0) {
        socket.write(data);
      }
      if (halfClose) {
        socket.end();
      }
    });
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("error", reject);
    socket.on("close", () => resolve(Buffer.concat(chunks).toString()));
  });
}

function errors(logs: LogEntry[]): LogEntry[] {
  return logs.filter((entry) => entry.level === "error");
}

test("full transaction", async () => {
  const running = await start((res) => {
    res.body.write("Hello, world!");
  });
  try {
    const reply = await exchange(running.port, "gemini://localhost\r\n");
    assert.equal(reply, "20 text/gemini; charset=UTF-8\r\nHello, world!");
  } finally {
    await stop(running);
  }
  assert.deepEqual(errors(running.logs), []);
});

test("handler sees the parsed request", async () => {
  const running = await start((res, req) => {
    res.body.write(`${req.uri.host}|${req.uri.path}|${req.uri.query}`);
  });
  try {
    const reply = await exchange(running.port, "gemini://example.com/docs/a.gmi?x=1\r\n");
    assert.equal(reply, "20 text/gemini; charset=UTF-8\r\nexample.com|docs/a.gmi|x=1");
  } finally {
    await stop(running);
  }
});

test("handler can answer with a header", async () => {
  const running = await start(async (res) => {
    await res.notFound();
  });
  try {
    assert.equal(await exchange(running.port, "gemini://localhost/missing\r\n"), "51 Not found\r\n");
  } finally {
    await stop(running);
  }
});

test("handler can pick the content type", async () => {
  const running = await start(async (res) => {
    res.body.write("plain");
    await res.flush("text/plain; charset=UTF-8");
  });
  try {
    assert.equal(
      await exchange(running.port, "gemini://localhost/a.txt\r\n"),
      "20 text/plain; charset=UTF-8\r\nplain"
    );
  } finally {
    await stop(running);
  }
});

test("malformed requests get 59", async () => {
  let calls = 0;
  const running = await start(() => {
    calls++;
  });
  try {
    const cases: Array<[string, boolean]> = [
      ["gemini://localhost", true],
      ["\r\n", false],
      ["gemini://localhost:10a\r\n", false],
      ["gemini:///no-host\r\n", false],
      ["gemini://localhost/" + "a".repeat(1010) + "\r\n", false],
    ];
    for (const [request, halfClose] of cases) {
      assert.equal(
        await exchange(running.port, request, halfClose),
        "59 Malformed request\r\n",
        JSON.stringify(request)
      );
    }
  } finally {
    await stop(running);
  }
  assert.equal(calls, 0);
  assert.equal(running.logs.filter((e) => e.msg === "malformed request").length, 5);
  assert.deepEqual(errors(running.logs), []);
});

test("a silent peer is closed without a response", async () => {
  const running = await start(() => {
    assert.fail("handler must not run");
  });
  try {
    assert.equal(await exchange(running.port, "", true), "");
  } finally {
    await stop(running);
  }
  assert.deepEqual(errors(running.logs), []);
});

test("failing handler gets 40 and is logged", async () => {
  const running = await start(async (res) => {
    res.body.write("never sent");
    throw new Error("boom");
  });
  try {
    assert.equal(
      await exchange(running.port, "gemini://localhost\r\n"),
      "40 Unexpected error. Retry later.\r\n"
    );
  } finally {
    await stop(running);
  }
  const logged = errors(running.logs);
  assert.equal(logged.length, 1);
  assert.equal(logged[0].msg, "an error occurred handling request");
  assert.equal(logged[0].message, "boom");
});

test("handler failing after its response keeps that response", async () => {
  const running = await start(async (res) => {
    await res.redirect("gemini://localhost/elsewhere");
    throw new Error("late failure");
  });
  try {
    assert.equal(
      await exchange(running.port, "gemini://localhost\r\n"),
      "30 gemini://localhost/elsewhere\r\n"
    );
  } finally {
    await stop(running);
  }
  assert.equal(errors(running.logs).length, 1);
});

test("handler leaving an error status unsent gets 40", async () => {
  const running = await start((res) => {
    res.status = Status.notFound;
  });
  try {
    assert.equal(
      await exchange(running.port, "gemini://localhost\r\n"),
      "40 Unexpected error. Retry later.\r\n"
    );
  } finally {
    await stop(running);
  }
  const logged = errors(running.logs);
  assert.equal(logged.length, 1);
  assert.equal(logged[0].error, "AssertionError");
});

test("handler leaving bytes in the writer gets 40", async () => {
  const running = await start(async (res) => {
    await res.writer.write("half a header");
  });
  try {
    assert.equal(
      await exchange(running.port, "gemini://localhost\r\n"),
      "40 Unexpected error. Retry later.\r\n"
    );
  } finally {
    await stop(running);
  }
  assert.equal(errors(running.logs).length, 1);
});

test("unexpected read failure gets 40 and is logged", async () => {
  let calls = 0;
  const running = await start(
    () => {
      calls++;
    },
    {},
    () => ({
      read: () => Promise.reject(Object.assign(new Error("read EACCES"), { code: "EACCES" })),
    })
  );
  try {
    assert.equal(await exchange(running.port, ""), "40 Unexpected error. Retry later.\r\n");
  } finally {
    await stop(running);
  }
  assert.equal(calls, 0);
  const logged = errors(running.logs);
  assert.equal(logged.length, 1);
  assert.equal(logged[0].msg, "an error occurred handling request");
  assert.equal(logged[0].code, "EACCES");
});

test("shutdown waits for every connection", async () => {
  const n = 5;
  let arrived = 0;
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  let allIn: () => void = () => {};
  const allArrived = new Promise<void>((resolve) => {
    allIn = resolve;
  });

  const running = await start(async (res, req) => {
    arrived++;
    if (arrived === n) allIn();
    await gate;
    res.body.write(`hello ${req.uri.path}`);
  });

  const replies: Promise<string>[] = [];
  for (let i = 0; i < n; i++) {
    replies.push(exchange(running.port, `gemini://localhost/${i}\r\n`));
  }
  await allArrived;
  assert.equal(running.server.activeConnections, n);

  let finished = false;
  const tracked = running.done.then(() => {
    finished = true;
  });
  running.server.shutdown();
  await setImmediate();
  assert.equal(running.server.state, "draining");
  assert.equal(finished, false);

  release();
  const got = await Promise.all(replies);
  await tracked;

  assert.equal(running.server.state, "stopped");
  assert.equal(running.server.activeConnections, 0);
  for (let i = 0; i < n; i++) {
    assert.equal(got[i], `20 text/gemini; charset=UTF-8\r\nhello ${i}`);
  }

  await assert.rejects(exchange(running.port, "gemini://localhost\r\n"), {
    code: "ECONNREFUSED",
  });
});

test("connections past maxConnections are dropped", async () => {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  let entered: () => void = () => {};
  const inHandler = new Promise<void>((resolve) => {
    entered = resolve;
  });

  const running = await start(
    async (res) => {
      entered();
      await gate;
      res.body.write("first");
    },
    { maxConnections: 1 }
  );
  try {
    const first = exchange(running.port, "gemini://localhost\r\n");
    await inHandler;
    assert.equal(await exchange(running.port, ""), "");
    release();
    assert.equal(await first, "20 text/gemini; charset=UTF-8\r\nfirst");
  } finally {
    release();
    await stop(running);
  }
});

test("run only once", async () => {
  const running = await start(() => {});
  try {
    await assert.rejects(
      running.server.run({ host: "127.0.0.1", port: 0 }, {}, () => {}),
      { name: "ServerStateError" }
    );
  } finally {
    await stop(running);
  }
  assert.equal(running.server.state, "stopped");
  running.server.shutdown();
});

test("bind failure rejects run", async () => {
  const running = await start(() => {});
  try {
    const other = new Server(createLogger("error", () => {}));
    await assert.rejects(
      other.run({ host: "127.0.0.1", port: running.port }, {}, () => {}),
      { code: "EADDRINUSE" }
    );
    assert.equal(other.state, "stopped");
  } finally {
    await stop(running);
  }
});

test("shutdown before listening", async () => {
  const server = new Server(createLogger("error", () => {}));
  server.shutdown();
  await server.run({ host: "127.0.0.1", port: 0 }, {}, () => {});
  assert.equal(server.state, "stopped");
});

test("invalid options are refused", async () => {
  const server = new Server(createLogger("error", () => {}));
  await assert.rejects(
    server.run({ host: "127.0.0.1", port: 0 }, { maxConnections: 0 }, () => {}),
    RangeError
  );
  assert.equal(server.state, "idle");
});

test("listenAndServe reports bind failures", async () => {
  const running = await start(() => {});
  try {
    await assert.rejects(
      listenAndServe({ host: "127.0.0.1", port: running.port }, () => {}, createLogger("error", () => {})),
      { code: "EADDRINUSE" }
    );
  } finally {
    await stop(running);
  }
});
