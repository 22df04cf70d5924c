import { UnsubscriptionError } from './errors';
const $$Subscription = Symbol('Subscription');
type TeardownLogic = Subscription | (() => void);
interface Subscription {
  readonly unsubscribed: boolean;
  add(teardown: TeardownLogic): void;
  remove(child: Subscription): void;
  unsubscribe(): void;
  [$$Subscription]: undefined;
}
class SubscriptionImplementation implements Subscription {
  private $p_action: (() => void) | undefined;
  private $p_children: Subscription[] | null = [];
  [$$Subscription]: undefined = undefined;
  constructor(action?: () => void) {
    this.$p_action = action;
  }
  get unsubscribed(): boolean {
    return this.$p_children === null;
  }
  add(teardown: TeardownLogic): void {
    const child = isSubscription(teardown) ? teardown : Subscription(teardown);
    if (child === this || child.unsubscribed) {
      return;
    }
    if (!this.$p_children) {
      child.unsubscribe();
      return;
    }
    this.$p_children.push(child);
  }
  remove(child: Subscription): void {
    if (!this.$p_children) {
      return;
    }
    const index = this.$p_children.indexOf(child);
    if (index !== -1) {
      this.$p_children.splice(index, 1);
    }
  }
  unsubscribe(): void {
    const children = this.$p_children;
    if (!children) {
      return;
    }
    this.$p_children = null;
    const action = this.$p_action;
    this.$p_action = undefined;
    const errors: unknown[] = [];
    if (action) {
      try {
        action();
      } catch (error) {
        errors.push(error);
      }
    }
    for (let i = 0; i < children.length; i++) {
      try {
        children[i].unsubscribe();
      } catch (error) {
        errors.push(error);
      }
    }
    if (errors.length > 0) {
      throw new UnsubscriptionError(errors);
    }
  }
}
function Subscription(action?: () => void): Subscription {
  return new SubscriptionImplementation(action);
}
function isSubscription(value: unknown): value is Subscription {
  return typeof value === 'object' && value !== null && $$Subscription in value;
}
const closedSubscription = Subscription();
closedSubscription.unsubscribe();
export { $$Subscription, type TeardownLogic, Subscription, isSubscription, closedSubscription };
