/**
 * 本地组合镜像
 *
 * 职责：
 * - 记录现金、保证金与各标的多空持仓及成本
 * - 按实际成交数量与成交价应用成交（多头买入/卖出、空头开仓/平仓）
 * - 统计各标的已实现盈亏
 *
 * 卖出与平仓数量以本地持有量为上限，超出部分不计入镜像。
 */
import type {
  FillApplication,
  Portfolio,
  PortfolioPosition,
  PortfolioSnapshot,
  RealizedGains,
} from '../../types/services.js';
import type { ExecutableAction } from '../../types/trading.js';
import type { PortfolioOptions } from './types.js';

type MutablePosition = {
  long: number;
  short: number;
  longCostBasis: number;
  shortCostBasis: number;
  shortMarginUsed: number;
};

type MutableGains = {
  long: number;
  short: number;
};

const EMPTY_POSITION: PortfolioPosition = {
  long: 0,
  short: 0,
  longCostBasis: 0,
  shortCostBasis: 0,
  shortMarginUsed: 0,
};

export function createPortfolio(options: PortfolioOptions): Portfolio {
  const { marginRequirement } = options;
  let cash = options.initialCash;
  let marginUsed = 0;
  const positions = new Map<string, MutablePosition>();
  const realizedGains = new Map<string, MutableGains>();

  const ensurePosition = (ticker: string): MutablePosition => {
    let position = positions.get(ticker);
    if (position === undefined) {
      position = { ...EMPTY_POSITION };
      positions.set(ticker, position);
    }
    return position;
  };

  const ensureGains = (ticker: string): MutableGains => {
    let gains = realizedGains.get(ticker);
    if (gains === undefined) {
      gains = { long: 0, short: 0 };
      realizedGains.set(ticker, gains);
    }
    return gains;
  };

  for (const ticker of options.tickers ?? []) {
    ensurePosition(ticker);
    ensureGains(ticker);
  }

  const applyLongBuy = (ticker: string, quantity: number, price: number): FillApplication => {
    const position = ensurePosition(ticker);
    const cost = quantity * price;
    const nextLong = position.long + quantity;
    position.longCostBasis = (position.long * position.longCostBasis + cost) / nextLong;
    position.long = nextLong;
    cash -= cost;
    return { appliedQuantity: quantity, realizedPnl: 0 };
  };

  const applyLongSell = (ticker: string, quantity: number, price: number): FillApplication => {
    const position = ensurePosition(ticker);
    const applied = Math.min(quantity, position.long);
    if (applied <= 0) {
      return { appliedQuantity: 0, realizedPnl: 0 };
    }
    const realizedPnl = (price - position.longCostBasis) * applied;
    cash += applied * price;
    position.long -= applied;
    if (position.long === 0) {
      position.longCostBasis = 0;
    }
    ensureGains(ticker).long += realizedPnl;
    return { appliedQuantity: applied, realizedPnl };
  };

  const applyShortOpen = (ticker: string, quantity: number, price: number): FillApplication => {
    const position = ensurePosition(ticker);
    const proceeds = quantity * price;
    const marginRequired = proceeds * marginRequirement;
    const nextShort = position.short + quantity;
    position.shortCostBasis = (position.short * position.shortCostBasis + proceeds) / nextShort;
    position.short = nextShort;
    position.shortMarginUsed += marginRequired;
    marginUsed += marginRequired;
    cash += proceeds - marginRequired;
    return { appliedQuantity: quantity, realizedPnl: 0 };
  };

  const applyShortCover = (ticker: string, quantity: number, price: number): FillApplication => {
    const position = ensurePosition(ticker);
    const applied = Math.min(quantity, position.short);
    if (applied <= 0) {
      return { appliedQuantity: 0, realizedPnl: 0 };
    }
    const realizedPnl = (position.shortCostBasis - price) * applied;
    const marginReleased = (applied / position.short) * position.shortMarginUsed;
    position.shortMarginUsed -= marginReleased;
    marginUsed -= marginReleased;
    cash += marginReleased - applied * price;
    position.short -= applied;
    if (position.short === 0) {
      position.shortCostBasis = 0;
      position.shortMarginUsed = 0;
    }
    ensureGains(ticker).short += realizedPnl;
    return { appliedQuantity: applied, realizedPnl };
  };

  function applyFill(
    action: ExecutableAction,
    ticker: string,
    quantity: number,
    price: number,
  ): FillApplication {
    if (!(quantity > 0) || !(price > 0)) {
      return { appliedQuantity: 0, realizedPnl: 0 };
    }
    switch (action) {
      case 'buy':
        return applyLongBuy(ticker, quantity, price);
      case 'sell':
        return applyLongSell(ticker, quantity, price);
      case 'short':
        return applyShortOpen(ticker, quantity, price);
      case 'cover':
        return applyShortCover(ticker, quantity, price);
    }
  }

  function snapshot(): PortfolioSnapshot {
    const positionEntries: Record<string, PortfolioPosition> = {};
    for (const [ticker, position] of positions) {
      positionEntries[ticker] = { ...position };
    }
    const gainEntries: Record<string, RealizedGains> = {};
    for (const [ticker, gains] of realizedGains) {
      gainEntries[ticker] = { ...gains };
    }
    return {
      cash,
      marginRequirement,
      marginUsed,
      positions: positionEntries,
      realizedGains: gainEntries,
    };
  }

  return {
    getCash: () => cash,
    getPosition: (ticker) => {
      const position = positions.get(ticker);
      return position === undefined ? EMPTY_POSITION : { ...position };
    },
    applyFill,
    deductCommission: (amount) => {
      if (amount > 0) {
        cash -= amount;
      }
    },
    snapshot,
  };
}
