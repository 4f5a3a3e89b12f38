/**
 * Walks a few pools through every kernel operation and prints the settlements.
 * Run: npm run scenarios   or   npx tsx src/scripts/kernel-scenarios.ts
 * Optional: SCENARIO_KAPPA=0.2 npm run scenarios
 */

import {
  burn,
  burnSwap,
  createPoolParams,
  getPoolView,
  initializePool,
  mint,
  swap,
  swapMint,
  isKernelError,
} from "../engine/index.js";
import type { PoolParams, PoolState } from "../types/lmsr.js";

const DEFAULT_KAPPA = "0.1";

function printView(label: string, params: PoolParams, state: PoolState): void {
  const view = getPoolView(params, state);
  console.log(`  ${label}`);
  console.log(`    balances = [${view.balances.join(", ")}]  L = ${view.totalShares}`);
  console.log(`    b = ${view.liquidity}  cost = ${view.cost}`);
  console.log(`    prices = [${view.prices.join(", ")}]`);
}

function twoAssetScenario(kappa: string): void {
  console.log("=== Two-asset pool (1000, 1000) ===\n");
  for (const approximation of [false, true]) {
    const params = createPoolParams({
      assets: [
        { symbol: "AAA", decimals: 18 },
        { symbol: "BBB", decimals: 18 },
      ],
      kappa,
      fees: "0",
      approximation,
    });
    const state = initializePool(params, ["1000", "1000"]);
    console.log(`approximation = ${approximation}`);
    for (const amountIn of ["10", "50", "100"]) {
      const { settlement } = swap(params, state, { inputIndex: 0, outputIndex: 1, amountIn });
      console.log(`  swap ${amountIn.padStart(4)} AAA -> ${settlement.amountOut} BBB  (${settlement.path})`);
    }
    const limited = swap(params, state, { inputIndex: 0, outputIndex: 1, amountIn: "100", limitRatio: "1.2" });
    console.log(
      `  swap 100 AAA limit 1.2 -> used ${limited.settlement.amountIn}, out ${limited.settlement.amountOut} (${limited.settlement.path})`
    );
    console.log("");
  }
}

function threeAssetScenario(kappa: string): void {
  console.log("=== Three-asset pool (1000, 1000, 1000), fee 0.003 ===\n");
  const params = createPoolParams({
    assets: [
      { symbol: "AAA", decimals: 18 },
      { symbol: "BBB", decimals: 18 },
      { symbol: "CCC", decimals: 6 },
    ],
    kappa,
    fees: "0.003",
    protocolFeeShare: "0.2",
    protocolFeeReceiver: "treasury",
  });
  let state = initializePool(params, ["1000", "1000", "1000"]);
  printView("initial", params, state);

  const minted = mint(params, state, { amount: "300" });
  state = minted.state;
  console.log(`\n  mint 300 -> deposits [${minted.settlement.deposits.join(", ")}], shares ${minted.settlement.sharesMinted}`);

  const single = swapMint(params, state, { inputIndex: 0, amountIn: "50" });
  state = single.state;
  console.log(
    `  swapMint 50 AAA -> shares ${single.settlement.sharesMinted}, alpha ${single.settlement.growthFactor}, ${single.settlement.iterations} iterations`
  );

  const redeemed = burnSwap(params, state, { shares: "30", targetIndex: 2 });
  state = redeemed.state;
  console.log(`  burnSwap 30 shares -> ${redeemed.settlement.amountOut} CCC (fee ${redeemed.settlement.fee})`);
  for (const outcome of redeemed.settlement.outcomes) {
    const detail =
      outcome.kind === "contribution" ? `${outcome.amountIn} in, ${outcome.amountOut} out` : `skipped: ${outcome.reason}`;
    console.log(`    asset ${outcome.assetIndex}: ${detail}`);
  }

  const burned = burn(params, state, { shares: "100" });
  state = burned.state;
  console.log(`  burn 100 shares -> [${burned.settlement.amountsOut.join(", ")}]\n`);
  printView("final", params, state);
}

function main(): void {
  const kappa = process.env.SCENARIO_KAPPA?.trim() || DEFAULT_KAPPA;
  try {
    twoAssetScenario(kappa);
    threeAssetScenario(kappa);
  } catch (err) {
    if (isKernelError(err)) {
      console.error(`Kernel error ${err.code}: ${err.message}`, err.metadata);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  }
}

main();
