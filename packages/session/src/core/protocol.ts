/**
 * Wire op-codes for in-session messages.
 *
 * Client packet:
 *   serverId:long messageAcknowledge:long reliableAcknowledge:long
 *   (ClientOp.ClientCommand seq:long text:string)*
 *   [ClientOp.VoipSpeex|VoipOpus voip-block]
 *   ClientOp.Move|MoveNoDelta count:byte usercmd* | ClientOp.Eof
 *
 * Server message:
 *   sequence:long lastClientCommand:long
 *   (ServerOp.ServerCommand seq:long text:string)*
 *   [ServerOp.Gamestate ... | ServerOp.Snapshot ... | ServerOp.VoipOpus ...]*
 *   ServerOp.Eof
 *
 * Gamestate:
 *   reliableSequence:long payloadLength:long payload clientIndex:long
 *   checksumFeed:long serverId:long pureServerId:long
 *
 * `pureServerId` is the id a `cp` answer must carry. A restart that keeps
 * the world changes `serverId` only, and tells sessions with a `serverid <id>`
 * server command.
 *
 * @module core/protocol
 */

export const ClientOp = {
  Bad: 0,
  Nop: 1,
  Move: 2,
  MoveNoDelta: 3,
  ClientCommand: 4,
  Eof: 5,
  VoipSpeex: 6,
  VoipOpus: 7,
} as const;

export type ClientOp = (typeof ClientOp)[keyof typeof ClientOp];

export const ServerOp = {
  Bad: 0,
  Nop: 1,
  Gamestate: 2,
  ServerCommand: 5,
  Snapshot: 7,
  Eof: 8,
  VoipOpus: 10,
} as const;

export type ServerOp = (typeof ServerOp)[keyof typeof ServerOp];
