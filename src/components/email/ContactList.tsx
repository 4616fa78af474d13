/**
 * 👥 ContactList Component
 *
 * Contact cards with the details found beside each address.
 *
 * @module components/email/ContactList
 */

import { Building2, Mail, Phone } from 'lucide-react';
import type { ContactSummary } from '@/types/api';

export function ContactList({ contacts }: { contacts: ContactSummary[] }) {
  if (contacts.length === 0) {
    return <p className="text-sm text-muted-foreground">No contacts found.</p>;
  }

  return (
    <ul className="grid gap-3 sm:grid-cols-2">
      {contacts.map((contact) => (
        <li key={contact.email.toLowerCase()} className="rounded-md border p-3 text-sm">
          <p className="font-medium">{contact.name}</p>
          {contact.position && <p className="text-xs text-muted-foreground">{contact.position}</p>}
          <div className="mt-2 space-y-1 text-xs text-muted-foreground">
            <p className="flex items-center gap-1.5">
              <Mail className="h-3 w-3" aria-hidden="true" />
              <a href={`mailto:${contact.email}`} className="hover:underline">
                {contact.email}
              </a>
            </p>
            {contact.phone && (
              <p className="flex items-center gap-1.5">
                <Phone className="h-3 w-3" aria-hidden="true" />
                {contact.phone}
              </p>
            )}
            {contact.company && (
              <p className="flex items-center gap-1.5">
                <Building2 className="h-3 w-3" aria-hidden="true" />
                {contact.company}
              </p>
            )}
          </div>
        </li>
      ))}
    </ul>
  );
}
