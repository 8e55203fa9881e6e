export { GameServer } from "./server.js";
export type { GameServerConfig } from "./server.js";
