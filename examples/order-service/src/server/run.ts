import { LOGGER } from "@tessera/logger-di"
import { type ContainerOptions, createContainer, ORDER_PROCESSOR } from "../app/create-container"
import type { Order } from "../domains/orders/order.model"

const SAMPLE_ORDERS: Order[] = [
  { id: 1, customerId: "c-1", lines: [{ sku: "tea", quantity: 2, unitPriceCents: 450 }] },
  { id: 2, customerId: "c-2", lines: [{ sku: "mug", quantity: 1, unitPriceCents: 1200 }] },
  { id: 3, customerId: "c-2", lines: [] },
]

export async function run(options: ContainerOptions = {}): Promise<void> {
  const container = createContainer(options)
  const logger = container.getRequiredService(LOGGER)
  const processor = container.getRequiredService(ORDER_PROCESSOR)

  try {
    for (const order of SAMPLE_ORDERS) {
      try {
        processor.process(order)
      } catch (err) {
        logger.warn("Skipped order {orderId}", { orderId: order.id, err })
      }
    }
  } finally {
    await container.dispose()
  }
}
