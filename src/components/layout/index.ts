export { Header } from './Header'
export { MainLayout } from './MainLayout'
export { Sidebar } from './Sidebar'
