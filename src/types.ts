export type Direction = "LONG" | "SHORT";
export type OrderType = "MARKET" | "LIMIT";
export type OrderStatus = "PENDING" | "ACCEPTED" | "FILLED" | "REJECTED" | "CANCELLED";
export type SignalIntent = "NONE" | "LONG" | "SHORT";

export interface AccountState {
  accountId: string;
  balance: number;
  equity: number;
  marginUsed: number;
  freeMargin: number; // equity - marginUsed, negative means margin call
  profitLoss: number; // equity - balance
  leverage: number;
  currency: string;
  updatedAt: string;
}

export interface InstrumentInfo {
  symbol: string;
  tickValue: number; // account currency per point per lot
  marginPerLot: number; // before leverage
  pointSize: number;
  lotStep: number;
  minVolume: number;
  maxVolume: number;
  digits: number;
}

export interface Position {
  symbol: string;
  direction: Direction;
  volume: number;
  entryPrice: number;
  currentPrice: number;
  profitLoss: number;
  stopLoss?: number;
  takeProfit?: number;
  orderId: string;
  openedAt: string;
}

export interface OrderRequest {
  symbol: string;
  type: OrderType;
  direction: Direction;
  volume: number;
  price?: number;
  stopLoss?: number;
  takeProfit?: number;
  comment?: string;
}

export interface Order {
  orderId: string;
  symbol: string;
  type: OrderType;
  direction: Direction;
  requestedVolume: number;
  requestedPrice?: number;
  stopLoss?: number;
  takeProfit?: number;
  status: OrderStatus;
  filledVolume: number;
  avgFillPrice?: number;
  rejectedReason?: string;
  comment?: string;
  createdAt: string;
  updatedAt: string;
}

export interface OrderResponse {
  orderId: string;
  status: OrderStatus;
  message: string;
}

export interface OrderModifyRequest {
  newPrice?: number;
  newStopLoss?: number;
  newTakeProfit?: number;
  newVolume?: number;
}

export interface PositionModifyRequest {
  stopLoss?: number;
  takeProfit?: number;
}

export interface BrokerConfig {
  accountId: string;
  isDemoAccount: boolean;
}

export interface MarketData {
  symbol: string;
  timeframe: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  timestamp: string;
}

export interface TradeInfo {
  kind: "OPEN" | "CLOSE";
  orderId: string;
  symbol: string;
  orderType: OrderType;
  direction: Direction;
  volume: number;
  price: number;
  profitLoss: number;
  stopLoss?: number;
  takeProfit?: number;
  executionTime: string;
  comment?: string;
}

export interface ExitParams {
  slMultiplier: number;
  tpMultiplier: number;
  slBufferMult: number;
  tpBufferMult: number;
  maxBufferPips: number;
  pointSize: number;
  useHybrid: boolean;
  atrWeight: number;
  pivotWeight: number;
}

export interface ExitLevels {
  atrStop: number;
  atrTarget: number;
  hybridStop: number;
  hybridTarget: number;
  bufferStop: number;
  bufferTarget: number;
}

export interface SizingResult {
  lots: number;
  capped: boolean;
  riskAmount: number;
  pipValue: number;
  marginCap: number;
  invalidInstrumentData: boolean;
  rejectionReason?: string;
}

export interface GatewaySnapshot {
  connected: boolean;
  account: AccountState;
  positions: Position[];
  workingOrders: Order[];
}

export interface RiskCheckResult {
  ok: boolean;
  reason?: string;
}
