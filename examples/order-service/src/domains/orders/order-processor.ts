import { createError } from "@tessera/errors"
import type { Logger, LoggerFactory } from "@tessera/logger"
import type { Order, ProcessedOrder } from "./order.model"

export class OrderProcessor {
  private readonly logger: Logger

  constructor(loggerFactory: LoggerFactory) {
    this.logger = loggerFactory.createLogger("OrderProcessor")
  }

  process(order: Order): ProcessedOrder {
    if (order.lines.length === 0) {
      throw createError("empty_order", `Order ${order.id} has no lines`, {
        context: { orderId: order.id },
      })
    }

    const totalCents = order.lines.reduce(
      (sum, line) => sum + line.quantity * line.unitPriceCents,
      0,
    )

    this.logger.info("Processed order {orderId}", {
      orderId: order.id,
      customerId: order.customerId,
      totalCents,
    })

    return { orderId: order.id, totalCents }
  }
}
