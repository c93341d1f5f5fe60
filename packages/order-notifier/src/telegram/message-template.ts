import { OrderNotification } from "../moysklad/order-notification";

export const MESSAGE_TITLE = "СОЗДАН НОВЫЙ ЗАКАЗ";
export const MISSING_VALUE = "—";
export const MISSING_COMMENT = "нет";

const MOMENT_PATTERN = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})/;

/**
 * `2024-09-24 12:00:00.000` and `2024-09-24T12:00:00Z` both render as
 * `2024-09-24 12:00:00`; anything else is shown as received.
 */
export function formatMoment(moment: string): string {
  const match = MOMENT_PATTERN.exec(moment);
  return match ? `${match[1]} ${match[2]}` : moment;
}

/** Kopecks to roubles with two decimals: 150000 → `1500.00` */
export function formatSum(sum: number): string {
  return (sum / 100).toFixed(2);
}

export function renderOrderMessage(order: OrderNotification): string {
  return [
    MESSAGE_TITLE,
    "",
    `Номер: ${order.number}`,
    `Дата: ${formatMoment(order.moment)}`,
    `Контрагент: ${order.counterpartyName ?? MISSING_VALUE}`,
    `Сумма: ${formatSum(order.sum)}`,
    `Статус: ${order.stateName ?? MISSING_VALUE}`,
    `Комментарий: ${order.comment ?? MISSING_COMMENT}`,
    `Ссылка: ${order.href}`,
  ].join("\n");
}
