/** One sheet row: order number (or contractor name) -> delivery date as written in the cell. */
export type OrderRecord = Readonly<{
  key: string;
  rawDeliveryDate: string;
}>;
