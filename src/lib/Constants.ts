import { ethers } from "ethers";

export default class Constants {
  static FEE_NUMERATOR = 997n;
  static FEE_DENOMINATOR = 1000n;
  static MINIMUM_LIQUIDITY = 1000n; // locked forever on first mint
  static EMPTY_PAYLOAD = "0x";
  static ZERO_ADDRESS = ethers.ZeroAddress;
}
