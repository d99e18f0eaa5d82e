export { TicketFilters } from './TicketFilters'
export { TicketList } from './TicketList'
