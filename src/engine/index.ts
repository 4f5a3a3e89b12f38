export {
  createPoolParams,
  initializePool,
  getPoolView,
  swap,
  mint,
  burn,
  swapMint,
  burnSwap,
  quoteSwap,
  quoteSwapMint,
  quoteBurnSwap,
  currentPairRatio,
} from "./pool-kernel.js";
export { enqueuePoolTask, pendingPoolTasks } from "./pool-queue.js";
export {
  KernelError,
  KernelErrorCode,
  DomainError,
  NonPositiveDomainError,
  ZeroLiquidityError,
  InfeasibleOutputError,
  LimitNotAboveCurrentError,
  SlippageExceededError,
  SolverDidNotConvergeError,
  InvalidRequestError,
  InsufficientBalanceError,
  PoolNotFoundError,
  isKernelError,
} from "./errors.js";
