import { NodeProvider } from "../utils/types/tracker.types";
import { NodeConfig } from "../utils/types/config.types";
import EthereumProvider from "../providers/ethereum.provider";
import logger from "../utils/logger";

export class NodeProviderFactory {
  /**
   * Creates the node provider the tracker reads from
   * @param node - RPC and WebSocket endpoints of the node
   * @returns NodeProvider instance
   */
  static createProvider(node: NodeConfig): NodeProvider {
    logger.info("Creating node provider", {
      rpcUrl: node.rpcUrl || undefined,
      wsUrl: node.wsUrl,
    });

    if (!node.wsUrl) {
      logger.error("WS_URL is not configured");
      throw new Error("WS_URL is required to subscribe to node heads");
    }

    return new EthereumProvider(node.rpcUrl, node.wsUrl);
  }
}

export default NodeProviderFactory;
