import React from 'react';
import { clsx } from 'clsx';

export interface TabDefinition {
  id: string;
  label: string;
  icon?: React.ReactNode;
}

/**
 * Drop tabs whose label or id appears in the hidden list
 */
export const filterTabs = <T extends TabDefinition>(tabs: readonly T[], hidden: readonly string[]): T[] => {
  const hiddenSet = new Set(hidden.map((entry) => entry.trim()));
  return tabs.filter((tab) => !hiddenSet.has(tab.label.trim()) && !hiddenSet.has(tab.id));
};

interface TabNavProps {
  tabs: readonly TabDefinition[];
  hiddenTabs: readonly string[];
  activeTab: string;
  onSelect: (id: string) => void;
  /** Rendered before the first tab */
  leading?: React.ReactNode;
}

export const TabNav: React.FC<TabNavProps> = ({ tabs, hiddenTabs, activeTab, onSelect, leading }) => (
  <nav className="tab-nav" aria-label="Navigasi utama">
    {leading}
    <div role="tablist">
      {filterTabs(tabs, hiddenTabs).map((tab) => (
        <button
          key={tab.id}
          id={tab.id}
          type="button"
          role="tab"
          aria-selected={tab.id === activeTab}
          className={clsx('tab-nav__tab', tab.id === activeTab && 'tab-nav__tab--active')}
          onClick={() => onSelect(tab.id)}
        >
          {tab.icon}
          {tab.label}
        </button>
      ))}
    </div>
  </nav>
);

export default TabNav;
