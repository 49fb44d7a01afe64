import { createSolanaRpcApi, createRpc } from "@solana/rpc";
import type { Commitment, Rpc, SolanaRpcApi } from "@solana/kit";
import { createDefaultRpcTransport } from "@solana/kit";

/**
 * Creates the RPC client lookup table accounts are fetched with. Requests
 * default to `commitment` unless they set their own.
 */
export function rpcFromUrl(
  url: string,
  commitment: Commitment = "finalized",
): Rpc<SolanaRpcApi> {
  const api = createSolanaRpcApi({
    defaultCommitment: commitment,
  });
  const transport = createDefaultRpcTransport({ url });
  const rpc = createRpc({ api, transport });
  return rpc;
}
