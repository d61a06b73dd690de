// Re-export all types
// Import from this file: import { SaleRecord, Dataset, DashboardData } from '@/lib/types'

// Core types
export * from './core';

// Dataset types
export * from './dataset';

// API types
export * from './api';
