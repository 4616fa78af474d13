export { Sidebar, type SidebarProps } from './Sidebar';
export { PageHeader, type PageHeaderProps } from './PageHeader';
