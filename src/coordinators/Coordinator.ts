export type CoordinatorDismissHandler = (coordinator: Coordinator) => void;

/**
 * A navigation flow: owns its screens and the child flows it started.
 */
export interface Coordinator {
  readonly childCoordinators: readonly Coordinator[];
  dismissHandler?: CoordinatorDismissHandler;
  start(): void;
}

/**
 * Child bookkeeping shared by all coordinators.
 */
export abstract class BaseCoordinator implements Coordinator {
  public dismissHandler?: CoordinatorDismissHandler;
  private children: Coordinator[] = [];

  public get childCoordinators(): readonly Coordinator[] {
    return this.children;
  }

  public abstract start(): void;

  public addChildCoordinator(coordinator: Coordinator): void {
    if (!this.children.includes(coordinator)) {
      this.children.push(coordinator);
    }
  }

  public removeChildCoordinator(coordinator: Coordinator): void {
    this.children = this.children.filter(child => child !== coordinator);
  }

  public removeAllChildCoordinators(): void {
    this.children = [];
  }
}
