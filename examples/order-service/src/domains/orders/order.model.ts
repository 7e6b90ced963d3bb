export type OrderLine = {
  sku: string
  quantity: number
  unitPriceCents: number
}

export type Order = {
  id: number
  customerId: string
  lines: OrderLine[]
}

export type ProcessedOrder = {
  orderId: number
  totalCents: number
}
