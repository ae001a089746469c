/**
 * @stakepool/chain-client — collaborator abstraction for the pool.
 *
 * The engine imports the interfaces. Dev mode and tests use MockChain,
 * which implements all three collaborators over one in-memory ledger.
 */

export type {
  AssetLedger,
  SettlementChannel,
  EpochOracle,
  ChainClient,
  TransferHook,
} from "./types.js";

export { MockChain, type MockChainOptions } from "./mock-client.js";
