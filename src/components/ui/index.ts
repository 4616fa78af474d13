/**
 * 📦 UI Components Barrel Export
 *
 * ```tsx
 * import { Button, Card, CardContent, Badge } from '@/components/ui';
 * ```
 *
 * @module components/ui
 */

export { Button, buttonVariants, type ButtonProps } from './button';
export { Checkbox, type CheckboxProps } from './checkbox';
export { Card, CardHeader, CardFooter, CardTitle, CardDescription, CardContent } from './card';
export { Badge, badgeVariants, SentimentBadge, CategoryBadge, PriorityBadge, type BadgeProps } from './badge';
export { Tabs, TabsList, TabsTrigger, TabsContent, type TabsTriggerProps } from './tabs';
export { Skeleton, EmailRowSkeleton, EmailListSkeleton, type SkeletonProps } from './skeleton';
