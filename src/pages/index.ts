export { Dashboard } from './Dashboard'
export { PlatformDetail } from './PlatformDetail'
export { Tickets } from './Tickets'
