import {
  BrokerConfig,
  InstrumentInfo,
  MarketData,
  Order,
  OrderModifyRequest,
  Position,
  PositionModifyRequest
} from "../types.js";

/**
 * Notifications a venue sends back after accepting work. They are the only
 * source of truth for order, position and account state.
 */
export type VenueEvent =
  | { type: "ACCEPTED"; orderId: string; time: string }
  | { type: "FILLED"; orderId: string; price: number; volume: number; time: string }
  | { type: "REJECTED"; orderId: string; reason: string; time: string }
  | { type: "CANCELLED"; orderId: string; time: string }
  | {
      type: "ORDER_MODIFIED";
      orderId: string;
      price?: number;
      volume?: number;
      stopLoss?: number;
      takeProfit?: number;
    }
  | { type: "POSITION_MODIFIED"; symbol: string; stopLoss?: number; takeProfit?: number }
  | { type: "POSITION_UPDATED"; symbol: string; currentPrice: number; profitLoss: number }
  | {
      type: "POSITION_CLOSED";
      symbol: string;
      price: number;
      profitLoss: number;
      reason: string;
      time: string;
    }
  | { type: "TICK"; data: MarketData }
  | {
      type: "ACCOUNT";
      balance: number;
      equity: number;
      marginUsed: number;
      leverage: number;
      currency: string;
      time: string;
    };

export type VenueEventSink = (event: VenueEvent) => Promise<void>;

export interface ExecutionVenue {
  readonly name: string;
  connect(config: BrokerConfig, sink: VenueEventSink): Promise<void>;
  disconnect(): Promise<void>;
  subscribe(symbol: string, timeframe: string): Promise<boolean>;
  instrumentInfo(symbol: string): InstrumentInfo;
  /** Takes the order; its outcome arrives later as events. */
  submitOrder(order: Order): Promise<void>;
  modifyOrder(order: Order, request: OrderModifyRequest): Promise<boolean>;
  cancelOrder(order: Order): Promise<boolean>;
  modifyPosition(position: Position, request: PositionModifyRequest): Promise<boolean>;
  closePosition(position: Position): Promise<boolean>;
}
