/**
 * Database Types
 *
 * These types describe the Supabase/PostgreSQL schema created by
 * `supabase/migrations/001_initial_schema.sql`. They follow the shape the
 * Supabase client expects (Row / Insert / Update / Relationships per table),
 * so queries are typed end to end.
 *
 * Keep this file in step with the migrations when the schema changes.
 */

import type { EmailCategory, EntityType, SentimentLabel } from './annotation';

export type { EmailCategory, EntityType, SentimentLabel };

/**
 * Database schema types.
 */
export interface Database {
  public: {
    Tables: {
      gmail_accounts: {
        Row: {
          id: string;
          user_id: string;
          email: string;
          display_name: string | null;
          access_token: string;
          refresh_token: string | null;
          token_expiry: string | null;
          last_sync_at: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: string;
          user_id: string;
          email: string;
          display_name?: string | null;
          access_token: string;
          refresh_token?: string | null;
          token_expiry?: string | null;
          last_sync_at?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          id?: string;
          user_id?: string;
          email?: string;
          display_name?: string | null;
          access_token?: string;
          refresh_token?: string | null;
          token_expiry?: string | null;
          last_sync_at?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Relationships: [];
      };
      emails: {
        Row: {
          id: string;
          user_id: string;
          gmail_id: string;
          thread_id: string | null;
          subject: string;
          sender_name: string;
          sender_email: string;
          received_at: string;
          raw_body: string;
          mime_type: string | null;
          normalized_body: string | null;
          summary: string | null;
          category: EmailCategory | null;
          sentiment_label: SentimentLabel | null;
          sentiment_score: number | null;
          priority_score: number | null;
          is_important: boolean;
          is_starred: boolean;
          is_gmail_important: boolean;
          needs_followup: boolean;
          followup_date: string | null;
          processing_error: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: string;
          user_id: string;
          gmail_id: string;
          thread_id?: string | null;
          subject?: string;
          sender_name?: string;
          sender_email: string;
          received_at: string;
          raw_body?: string;
          mime_type?: string | null;
          normalized_body?: string | null;
          summary?: string | null;
          category?: EmailCategory | null;
          sentiment_label?: SentimentLabel | null;
          sentiment_score?: number | null;
          priority_score?: number | null;
          is_important?: boolean;
          is_starred?: boolean;
          is_gmail_important?: boolean;
          needs_followup?: boolean;
          followup_date?: string | null;
          processing_error?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          id?: string;
          user_id?: string;
          gmail_id?: string;
          thread_id?: string | null;
          subject?: string;
          sender_name?: string;
          sender_email?: string;
          received_at?: string;
          raw_body?: string;
          mime_type?: string | null;
          normalized_body?: string | null;
          summary?: string | null;
          category?: EmailCategory | null;
          sentiment_label?: SentimentLabel | null;
          sentiment_score?: number | null;
          priority_score?: number | null;
          is_important?: boolean;
          is_starred?: boolean;
          is_gmail_important?: boolean;
          needs_followup?: boolean;
          followup_date?: string | null;
          processing_error?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Relationships: [];
      };
      entities: {
        Row: {
          id: string;
          email_id: string;
          user_id: string;
          text: string;
          type: EntityType;
        };
        Insert: {
          id?: string;
          email_id: string;
          user_id: string;
          text: string;
          type: EntityType;
        };
        Update: {
          id?: string;
          email_id?: string;
          user_id?: string;
          text?: string;
          type?: EntityType;
        };
        Relationships: [
          {
            foreignKeyName: 'entities_email_id_fkey';
            columns: ['email_id'];
            isOneToOne: false;
            referencedRelation: 'emails';
            referencedColumns: ['id'];
          },
        ];
      };
      keywords: {
        Row: {
          id: string;
          email_id: string;
          user_id: string;
          word: string;
          score: number;
        };
        Insert: {
          id?: string;
          email_id: string;
          user_id: string;
          word: string;
          score: number;
        };
        Update: {
          id?: string;
          email_id?: string;
          user_id?: string;
          word?: string;
          score?: number;
        };
        Relationships: [
          {
            foreignKeyName: 'keywords_email_id_fkey';
            columns: ['email_id'];
            isOneToOne: false;
            referencedRelation: 'emails';
            referencedColumns: ['id'];
          },
        ];
      };
      action_items: {
        Row: {
          id: string;
          email_id: string;
          user_id: string;
          text: string;
          deadline: string | null;
          completed: boolean;
          completed_at: string | null;
          created_at: string;
        };
        Insert: {
          id?: string;
          email_id: string;
          user_id: string;
          text: string;
          deadline?: string | null;
          completed?: boolean;
          completed_at?: string | null;
          created_at?: string;
        };
        Update: {
          id?: string;
          email_id?: string;
          user_id?: string;
          text?: string;
          deadline?: string | null;
          completed?: boolean;
          completed_at?: string | null;
          created_at?: string;
        };
        Relationships: [
          {
            foreignKeyName: 'action_items_email_id_fkey';
            columns: ['email_id'];
            isOneToOne: false;
            referencedRelation: 'emails';
            referencedColumns: ['id'];
          },
        ];
      };
      contacts: {
        Row: {
          id: string;
          email_id: string;
          user_id: string;
          name: string;
          email: string;
          phone: string | null;
          company: string | null;
          position: string | null;
        };
        Insert: {
          id?: string;
          email_id: string;
          user_id: string;
          name: string;
          email: string;
          phone?: string | null;
          company?: string | null;
          position?: string | null;
        };
        Update: {
          id?: string;
          email_id?: string;
          user_id?: string;
          name?: string;
          email?: string;
          phone?: string | null;
          company?: string | null;
          position?: string | null;
        };
        Relationships: [
          {
            foreignKeyName: 'contacts_email_id_fkey';
            columns: ['email_id'];
            isOneToOne: false;
            referencedRelation: 'emails';
            referencedColumns: ['id'];
          },
        ];
      };
    };
    Views: { [_ in never]: never };
    Functions: { [_ in never]: never };
    Enums: { [_ in never]: never };
    CompositeTypes: { [_ in never]: never };
  };
}

/**
 * Helper type to get a table row type.
 */
export type TableRow<T extends keyof Database['public']['Tables']> =
  Database['public']['Tables'][T]['Row'];

/**
 * Helper type to get a table insert type.
 */
export type TableInsert<T extends keyof Database['public']['Tables']> =
  Database['public']['Tables'][T]['Insert'];

/**
 * Helper type to get a table update type.
 */
export type TableUpdate<T extends keyof Database['public']['Tables']> =
  Database['public']['Tables'][T]['Update'];

/**
 * Convenient type aliases for common table rows.
 */
export type GmailAccount = TableRow<'gmail_accounts'>;
export type Email = TableRow<'emails'>;
export type EntityRow = TableRow<'entities'>;
export type KeywordRow = TableRow<'keywords'>;
export type ActionItemRow = TableRow<'action_items'>;
export type ContactRow = TableRow<'contacts'>;
