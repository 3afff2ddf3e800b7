import Constants from "./Constants";

export default class Helpers {
  static assert(cond: boolean, msg: string): asserts cond {
    if (!cond) throw new Error(msg);
  }

  static sameAddress(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
  }

  static isZeroAddress(a: string): boolean {
    return Helpers.sameAddress(a, Constants.ZERO_ADDRESS);
  }

  /**
   * Orders two assets the way a pair stores them: the numerically lower address is slot 0.
   */
  static sortAssets(a: string, b: string): [string, string] {
    Helpers.assert(!Helpers.sameAddress(a, b), "sortAssets: identical addresses");
    return BigInt(a) < BigInt(b) ? [a, b] : [b, a];
  }

  static sqrt(y: bigint): bigint {
    if (y < 0n) throw new Error("sqrt: negative input");
    if (y < 4n) return y === 0n ? 0n : 1n;
    let z = y;
    let x = y / 2n + 1n;
    while (x < z) {
      z = x;
      x = (y / x + x) / 2n;
    }
    return z;
  }
}
