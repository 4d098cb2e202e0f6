import { createServer } from "node:http";
import { Server } from "socket.io";
import { SessionServer, SocketIoTransport, superjsonParser } from "@arena/session";
import {
  DeathmatchSimulation,
  DeathmatchWorldWriter,
  loadArena,
  loadContentManifest,
  manifestIntegrity,
} from "@arena/example-deathmatch";

const startTime = Date.now();
const port = Number.parseInt(process.env.PORT ?? "27960", 10);
const fps = 20;

const transport = new SocketIoTransport();
const simulation = new DeathmatchSimulation(loadArena(), { reservedNames: ["admin", "server"] });

const sessions = new SessionServer(
  {
    transport,
    simulation,
    content: manifestIntegrity(loadContentManifest()),
    world: new DeathmatchWorldWriter(simulation.world),
    heartbeat: {
      heartbeat: () => console.log("💓 Heartbeat: player count crossed a threshold"),
    },
  },
  { fps, dedicated: 1, teamSwitch: true },
);
simulation.attach(sessions);
transport.bind(sessions);

const httpServer = createServer((req, res) => {
  const url = new URL(req.url ?? "/", "http://localhost");

  if (req.method === "GET" && url.pathname === "/api/health") {
    res.writeHead(200, { "content-type": "application/json" });
    res.end(
      JSON.stringify({
        status: "ok",
        timestamp: new Date().toISOString(),
        uptime: Date.now() - startTime,
      }),
    );
    return;
  }

  if (req.method === "GET" && url.pathname === "/api/status") {
    const status = sessions.status();
    res.writeHead(200, { "content-type": "application/json" });
    res.end(
      JSON.stringify({
        serverId: status.serverId,
        maxClients: status.maxClients,
        clients: [...status.clients.values()],
      }),
    );
    return;
  }

  // socket.io answers its own path before this handler runs
  res.writeHead(404, { "content-type": "text/plain" });
  res.end(`Not Found: ${url.pathname}`);
});

const io = new Server(httpServer, { parser: superjsonParser });
transport.listen(io);

io.on("connection", (socket) => {
  socket.on("sv:status", () => {
    socket.emit("sv:status", sessions.status());
  });
});

const frame = setInterval(() => {
  sessions.frame();
  sessions.sendQueuedMessages();
}, 1000 / fps);

httpServer.listen(port, () => {
  console.log(`🎮 Session server running on http://localhost:${port}`);
  console.log(`🔌 Socket.IO ready for connections`);
});

function shutdown(): void {
  clearInterval(frame);
  io.close().then(
    () => console.log("🛑 Session server stopped"),
    (error: unknown) => console.error("Failed to close Socket.IO server", error),
  );
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
