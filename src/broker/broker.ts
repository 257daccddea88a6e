import {
  AccountState,
  BrokerConfig,
  GatewaySnapshot,
  InstrumentInfo,
  MarketData,
  Order,
  OrderModifyRequest,
  OrderRequest,
  OrderResponse,
  Position,
  PositionModifyRequest,
  TradeInfo
} from "../types.js";

export type Unsubscribe = () => void;

export type MarketDataListener = (data: MarketData) => void | Promise<void>;
export type TradeListener = (trade: TradeInfo) => void | Promise<void>;
export type OrderListener = (order: Order) => void | Promise<void>;

/**
 * Session against one execution venue. Calls that change venue state only
 * request the change; the outcome comes back through the event listeners.
 */
export interface Broker {
  connect(config: BrokerConfig): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  subscribeToMarketData(symbol: string, timeframe: string): Promise<boolean>;

  placeOrder(request: OrderRequest): Promise<OrderResponse>;
  modifyOrder(orderId: string, request: OrderModifyRequest): Promise<boolean>;
  cancelOrder(orderId: string): Promise<boolean>;
  modifyPosition(symbol: string, request: PositionModifyRequest): Promise<boolean>;
  closePosition(symbol: string): Promise<boolean>;

  getPositions(): Promise<Position[]>;
  getAccountInfo(): Promise<AccountState>;
  getOrder(orderId: string): Promise<Order>;
  getWorkingOrders(): Promise<Order[]>;
  snapshot(): Promise<GatewaySnapshot>;
  getInstrumentInfo(symbol: string): InstrumentInfo;

  onMarketDataUpdate(listener: MarketDataListener): Unsubscribe;
  onTradeExecuted(listener: TradeListener): Unsubscribe;
  onOrderUpdate(listener: OrderListener): Unsubscribe;
}
