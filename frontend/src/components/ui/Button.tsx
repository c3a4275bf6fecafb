import React from 'react';
import { cva, type VariantProps } from 'class-variance-authority';
import { clsx } from 'clsx';
import { motion, type HTMLMotionProps } from 'framer-motion';
import { Loader2 } from 'lucide-react';

const buttonVariants = cva('sp-btn', {
  variants: {
    variant: {
      primary: 'sp-btn--primary',
      secondary: 'sp-btn--secondary',
      ghost: 'sp-btn--ghost',
      danger: 'sp-btn--danger',
    },
    size: {
      sm: 'sp-btn--sm',
      md: 'sp-btn--md',
      icon: 'sp-btn--icon',
    },
    fullWidth: {
      true: 'sp-btn--full',
    },
  },
  defaultVariants: {
    variant: 'primary',
    size: 'md',
  },
});

export interface ButtonProps
  extends Omit<HTMLMotionProps<'button'>, 'children'>,
    VariantProps<typeof buttonVariants> {
  children?: React.ReactNode;
  isLoading?: boolean;
  leftIcon?: React.ReactNode;
}

export const Button = React.forwardRef<HTMLButtonElement, ButtonProps>(
  ({ className, variant, size, fullWidth, isLoading, leftIcon, children, disabled, type = 'button', ...props }, ref) => {
    const inactive = Boolean(disabled || isLoading);
    return (
      <motion.button
        ref={ref}
        type={type}
        className={clsx(buttonVariants({ variant, size, fullWidth }), className)}
        disabled={inactive}
        whileTap={{ scale: inactive ? 1 : 0.97 }}
        transition={{ duration: 0.15 }}
        {...props}
      >
        {isLoading ? (
          <Loader2 className="sp-spin" size={16} aria-hidden />
        ) : leftIcon ? (
          <span className="sp-btn__icon">{leftIcon}</span>
        ) : null}
        {children}
      </motion.button>
    );
  }
);

Button.displayName = 'Button';

export interface IconButtonProps extends Omit<ButtonProps, 'leftIcon' | 'children'> {
  icon: React.ReactNode;
  'aria-label': string;
}

export const IconButton = React.forwardRef<HTMLButtonElement, IconButtonProps>(
  ({ icon, size = 'icon', variant = 'ghost', ...props }, ref) => (
    <Button ref={ref} variant={variant} size={size} {...props}>
      {icon}
    </Button>
  )
);

IconButton.displayName = 'IconButton';

export { buttonVariants };
