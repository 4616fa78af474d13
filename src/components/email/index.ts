/**
 * 📧 Email Components
 *
 * @module components/email
 */

export { EmailList, type EmailListProps } from './EmailList';
export { EmailListItem, type EmailListItemProps } from './EmailListItem';
export { EmailDetailView, type EmailDetailViewProps } from './EmailDetailView';
export { ActionItemList, type ActionItemListProps } from './ActionItemList';
export { EntityList } from './EntityList';
export { KeywordList } from './KeywordList';
export { ContactList } from './ContactList';
export { InboxFilterBar, type InboxFilters, type InboxFilterBarProps } from './InboxFilterBar';
