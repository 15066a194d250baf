import { Server } from "socket.io";
import http from "node:http";
import { RealtimeEvent, RealtimePublisher } from "../../application/ports/services";
import { presentConfig, presentReceipt } from "../serializers";

export function contractRoom(contractId: string): string {
  return `contract:${contractId}`;
}

export function initSocketServer(server: http.Server, corsOrigin: string, contractId: string): Server {
  const io = new Server(server, {
    cors: {
      origin: corsOrigin === "*" ? true : corsOrigin,
      credentials: true
    }
  });

  // One contract per service; every client watches it.
  io.on("connection", (socket) => {
    void socket.join(contractRoom(contractId));
  });

  return io;
}

export function toWirePayload(event: RealtimeEvent) {
  switch (event.type) {
    case "auction:initialized":
      return { contractId: event.contractId, config: presentConfig(event.config) };
    case "auction:purchased":
      return { contractId: event.contractId, receipt: presentReceipt(event.receipt) };
  }
}

export class SocketPublisher implements RealtimePublisher {
  constructor(private readonly io: Server) {}

  publish(event: RealtimeEvent): void {
    this.io.to(contractRoom(event.contractId)).emit(event.type, toWirePayload(event));
  }
}
