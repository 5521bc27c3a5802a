export const BeaconOracleAbi = [
  {
    anonymous: false,
    inputs: [
      {
        indexed: false,
        internalType: "uint256",
        name: "slot",
        type: "uint256",
      },
      {
        indexed: false,
        internalType: "uint256",
        name: "timestamp",
        type: "uint256",
      },
      {
        indexed: false,
        internalType: "bytes32",
        name: "blockRoot",
        type: "bytes32",
      },
    ],
    name: "EigenLayerBeaconOracleUpdate",
    type: "event",
  },
  {
    inputs: [
      {
        internalType: "uint256",
        name: "",
        type: "uint256",
      },
    ],
    name: "timestampToBlockRoot",
    outputs: [
      {
        internalType: "bytes32",
        name: "",
        type: "bytes32",
      },
    ],
    stateMutability: "view",
    type: "function",
  },
  {
    inputs: [
      {
        internalType: "uint256",
        name: "_targetTimestamp",
        type: "uint256",
      },
    ],
    name: "addTimestamp",
    outputs: [],
    stateMutability: "nonpayable",
    type: "function",
  },
] as const;
