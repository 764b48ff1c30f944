import { ethers } from "ethers";

const MESSAGE_TUPLE =
  "tuple(uint256 id, address sender, uint256 srcChainId, uint256 destChainId, address owner, address to, address refundAddress, uint256 depositValue, uint256 callValue, uint256 processingFee, uint256 gasLimit, bytes data, string memo)";

export const BRIDGE_ABI = [
  `event MessageSent(bytes32 indexed msgHash, ${MESSAGE_TUPLE} message)`,
  `function processMessage(${MESSAGE_TUPLE} message, bytes proof) external`,
  "function getMessageStatus(bytes32 msgHash) view returns (uint8)",
];

export const CROSS_CHAIN_SYNC_ABI = [
  "function getCrossChainBlockHash(uint256 number) view returns (bytes32)",
  "function getCrossChainSignalRoot(uint256 number) view returns (bytes32)",
  "function getLatestSyncedHeight() view returns (uint64)",
];

export const ROLLUP_ABI = [
  "event BlockProposed(uint256 indexed id, tuple(bytes32 txListHash, address beneficiary, uint32 gasLimit, uint64 timestamp) meta)",
  "event BlockVerified(uint256 indexed id, bytes32 blockHash)",
  "function proposeBlock(bytes[] inputs) external",
  "function proveBlock(uint256 blockId, bytes[] inputs) external",
  "function verifyBlocks(uint256 maxBlocks) external",
];

export const bridgeInterface = new ethers.Interface(BRIDGE_ABI);
export const crossChainSyncInterface = new ethers.Interface(CROSS_CHAIN_SYNC_ABI);
export const rollupInterface = new ethers.Interface(ROLLUP_ABI);

export const MESSAGE_SENT_TOPIC0 = ethers.id(
  "MessageSent(bytes32,(uint256,address,uint256,uint256,address,address,address,uint256,uint256,uint256,uint256,bytes,string))",
);

export const BLOCK_PROPOSED_TOPIC0 = ethers.id(
  "BlockProposed(uint256,(bytes32,address,uint32,uint64))",
);

export const BLOCK_VERIFIED_TOPIC0 = ethers.id(
  "BlockVerified(uint256,bytes32)",
);

// Bridge.getMessageStatus values
export const MESSAGE_STATUS_NEW = 0n;
export const MESSAGE_STATUS_DONE = 2n;
