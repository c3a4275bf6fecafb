export { Preloader } from './Preloader';
export { AppHeader, DASHBOARD_LABEL } from './AppHeader';
export { TabNav, filterTabs } from './TabNav';
export type { TabDefinition } from './TabNav';
export { AccountPanel } from './AccountPanel';
export { HelpPanel } from './HelpPanel';
