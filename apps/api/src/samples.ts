import type { SourceDescriptor, SourceType } from './types/schema';
import { buildSchemaInfo } from './utils/profile';
import { collectColumns } from './ingest/csv';

const sampleData = {
  customers: [
    { customer_id: 'C001', name: 'Jane Tan', email: 'jane@example.org', country: 'Malaysia', signup_date: '2024-01-12' },
    { customer_id: 'C002', name: 'Ali Rahman', email: 'ali@example.org', country: 'Malaysia', signup_date: '2024-02-03' },
    { customer_id: 'C003', name: 'Maya Lee', email: null, country: 'Singapore', signup_date: '2024-02-11' }
  ],
  orders: [
    { order_id: 1001, customer_id: 'C001', amount: 250.5, status: 'paid', created_at: '2024-03-01T10:15:00Z' },
    { order_id: 1002, customer_id: 'C002', amount: 100, status: 'paid', created_at: '2024-03-02T08:40:00Z' },
    { order_id: 1003, customer_id: 'C001', amount: 75.25, status: 'refunded', created_at: '2024-03-07T16:05:00Z' },
    { order_id: 1004, customer_id: 'C003', amount: 300, status: 'pending', created_at: '2024-03-08T12:00:00Z' }
  ],
  shipments: [
    { shipment_id: 'S01', order_id: 1001, carrier: 'DHL', city: 'Kuala Lumpur', shipped_at: '2024-03-02' },
    { shipment_id: 'S02', order_id: 1002, carrier: 'FedEx', city: 'Penang', shipped_at: '2024-03-03' },
    { shipment_id: 'S03', order_id: 1004, carrier: 'DHL', city: 'Singapore', shipped_at: '2024-03-09' }
  ]
};

const buildSource = (
  id: string,
  type: SourceType,
  rows: Record<string, unknown>[]
): SourceDescriptor => ({
  id,
  name: id,
  type,
  config: {},
  schemaInfo: buildSchemaInfo({ columns: collectColumns(rows), rows })
});

export const loadSampleSources = (): SourceDescriptor[] => [
  buildSource('customers', 'csv', sampleData.customers),
  buildSource('orders', 'postgresql', sampleData.orders),
  buildSource('shipments', 'json', sampleData.shipments)
];
