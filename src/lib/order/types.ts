export interface OrderListOptions {
  /** Field separator, a single character */
  delimiter: string;
  /** Drop the first non-empty row (a column heading) */
  skipHeader: boolean;
}

export const DEFAULT_ORDER_OPTIONS: OrderListOptions = {
  delimiter: ",",
  skipHeader: false,
};
