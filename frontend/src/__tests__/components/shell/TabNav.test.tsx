import React from 'react';
import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { TabNav, filterTabs, type TabDefinition } from '../../../components/shell/TabNav';
import { DEFAULT_HIDDEN_TABS } from '../../../config/runtimeConfig';

const tabs: TabDefinition[] = [
  { id: 'chat-tab', label: 'Obrolan' },
  { id: 'files-tab', label: 'Berkas' },
  { id: 'resources-tab', label: 'Sumber Daya' },
  { id: 'settings-tab', label: 'Pengaturan' },
  { id: 'help-tab', label: 'Bantuan' },
];

describe('filterTabs', () => {
  it('drops the default hidden tabs', () => {
    expect(filterTabs(tabs, DEFAULT_HIDDEN_TABS).map((tab) => tab.id)).toEqual(['chat-tab', 'files-tab']);
  });

  it('matches hidden entries by label or by id', () => {
    expect(filterTabs(tabs, ['Berkas', 'help-tab']).map((tab) => tab.label)).toEqual([
      'Obrolan',
      'Sumber Daya',
      'Pengaturan',
    ]);
  });

  it('ignores surrounding whitespace in labels', () => {
    expect(filterTabs([{ id: 'x', label: ' Bantuan ' }], ['Bantuan'])).toEqual([]);
  });

  it('keeps everything when nothing is hidden', () => {
    expect(filterTabs(tabs, [])).toEqual(tabs);
  });
});

describe('TabNav', () => {
  it('renders only visible tabs and marks the active one', () => {
    render(<TabNav tabs={tabs} hiddenTabs={DEFAULT_HIDDEN_TABS} activeTab="chat-tab" onSelect={jest.fn()} />);

    expect(screen.getAllByRole('tab').map((tab) => tab.textContent)).toEqual(['Obrolan', 'Berkas']);
    expect(screen.getByRole('tab', { name: 'Obrolan' })).toHaveAttribute('aria-selected', 'true');
    expect(screen.queryByRole('tab', { name: 'Pengaturan' })).not.toBeInTheDocument();
  });

  it('reports the selected tab', async () => {
    const onSelect = jest.fn();
    render(<TabNav tabs={tabs} hiddenTabs={[]} activeTab="chat-tab" onSelect={onSelect} />);

    await userEvent.click(screen.getByRole('tab', { name: 'Bantuan' }));

    expect(onSelect).toHaveBeenCalledWith('help-tab');
  });
});
