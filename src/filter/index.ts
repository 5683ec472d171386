export type { IMembershipFilter, MembershipFilterOptions } from './IMembershipFilter';

export { MembershipFilter } from './MembershipFilter';
export {
  FilterSerializer,
  FILTER_MAGIC,
  FILTER_VERSION,
  FILTER_HEADER_SIZE,
} from './FilterSerializer';
